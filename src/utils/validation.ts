import Joi from 'joi';
import type { AgentCandidate, FeedbackEntry, TaskContext } from '../types/index.js';
import { ValidationError } from './errors.js';

/**
 * Identifiers that travel in callback URLs: task ids and todolist ids
 */
export const TODOLIST_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/;

export const todolistIdSchema = Joi.string()
  .pattern(TODOLIST_ID_PATTERN)
  .required()
  .messages({
    'any.required': 'todolist id is required',
    'string.empty': 'todolist id is required',
    'string.pattern.base': 'todolist id must be 1-128 characters of letters, digits, ".", "_", ":" or "-"',
  });

export const agentCandidateSchema = Joi.object<AgentCandidate>({
  endpoint: Joi.string().allow(''),
  name: Joi.string(),
  username: Joi.string(),
  role: Joi.string(),
  profile: Joi.string().allow(''),
  capabilities: Joi.object({
    pushNotifications: Joi.boolean(),
    streaming: Joi.boolean(),
  }).unknown(true),
}).unknown(true);

export const feedbackSchema = Joi.object<FeedbackEntry>({
  content: Joi.string().required(),
  time: Joi.string().isoDate(),
});

export const taskSubmissionSchema = Joi.object<TaskContext>({
  taskId: Joi.string().pattern(TODOLIST_ID_PATTERN).messages({
    'string.pattern.base': 'taskId must be 1-128 characters of letters, digits, ".", "_", ":" or "-"',
  }),
  contextId: Joi.string().max(256),
  message: Joi.string().min(1).max(100000).required(),
  agents: Joi.array().items(agentCandidateSchema).max(100),
  role: Joi.string(),
  delivery: Joi.string().valid('blocking', 'non_blocking'),
  feedback: Joi.array().items(feedbackSchema),
  metadata: Joi.object().unknown(true),
});

/**
 * Validate input against a schema, returning the converted value
 */
export function validate<T>(schema: Joi.AnySchema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: { objects: true },
  });

  if (error) {
    throw new ValidationError(
      `Validation failed: ${error.details.map(detail => detail.message).join(', ')}`,
      error.details.map(detail => ({ field: detail.path.join('.'), message: detail.message }))
    );
  }

  return value;
}

export function isValidTodolistId(value: unknown): value is string {
  return typeof value === 'string' && TODOLIST_ID_PATTERN.test(value);
}
