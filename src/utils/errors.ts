import type { FailureDetail, FailureType } from '../types/index.js';
import { getErrorMessage } from '../types/index.js';

/**
 * Base class for every failure the relay reports to a caller. Each subclass
 * maps onto one FailureDetail type.
 */
export abstract class RelayError extends Error {
  abstract readonly type: FailureType;

  constructor(
    message: string,
    readonly code?: string,
    readonly targetDetail?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }

  toDetail(): FailureDetail {
    const detail: FailureDetail = { type: this.type, message: this.message };
    if (this.code !== undefined) detail.code = this.code;
    if (this.targetDetail !== undefined) detail.targetDetail = this.targetDetail;
    return detail;
  }
}

/** No usable endpoint in the context and no default configured. */
export class ResolutionError extends RelayError {
  readonly type = 'resolution';
}

/** The target could not be reached or the exchange broke off. */
export class TransportError extends RelayError {
  readonly type = 'transport';
}

/** The target answered and refused or failed the task. */
export class ProtocolRejection extends RelayError {
  readonly type = 'protocol_rejection';
}

export class TimeoutError extends RelayError {
  readonly type = 'timeout';
}

export class CancelledError extends RelayError {
  readonly type = 'cancelled';
}

/** A webhook delivery whose state could not be mapped to an outcome. */
export class CallbackClassificationError extends RelayError {
  readonly type = 'classification';
}

export class InternalError extends RelayError {
  readonly type = 'internal';
}

/**
 * Request payload failed joi validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details: Array<{ field: string; message: string }>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function toFailureDetail(error: unknown): FailureDetail {
  if (error instanceof RelayError) {
    return error.toDetail();
  }
  return new InternalError(getErrorMessage(error)).toDetail();
}
