import { describe, it, expect } from 'vitest';
import {
  buildCancelRequest,
  buildMessageRequest,
  classifyState,
  extractResultText,
  firstAgentText,
  parseAgentCard,
  parseJsonRpcResponse,
  parseResult,
  partsText,
  readNotification,
  readSequenceHint,
} from '../../src/utils/protocol.js';
import { ProtocolRejection } from '../../src/utils/errors.js';
import type { A2AMessage, A2ATask } from '../../src/types/index.js';

const message = (role: string, text: string): A2AMessage => ({
  kind: 'message',
  messageId: `m-${text}`,
  role,
  parts: [{ kind: 'text', text }],
});

describe('A2A protocol helpers', () => {
  describe('classifyState', () => {
    it('should map remote states onto relay outcomes', () => {
      expect(classifyState('submitted')).toBe('progress');
      expect(classifyState('working')).toBe('progress');
      expect(classifyState('completed')).toBe('completed');
      expect(classifyState('failed')).toBe('rejected');
      expect(classifyState('canceled')).toBe('rejected');
      expect(classifyState('rejected')).toBe('rejected');
      expect(classifyState('input-required')).toBe('input_required');
      expect(classifyState('auth-required')).toBe('input_required');
      expect(classifyState('paused')).toBe('unknown');
      expect(classifyState(undefined)).toBe('unknown');
    });
  });

  describe('parseResult', () => {
    it('should read results by their kind', () => {
      expect(parseResult({ kind: 'task', id: 't1', status: { state: 'working' } })?.kind).toBe('task');
      expect(parseResult({ kind: 'message', role: 'agent', parts: [] })?.kind).toBe('message');
      expect(parseResult({ kind: 'status-update', taskId: 't1', status: { state: 'completed' } })?.kind).toBe(
        'status-update'
      );
      expect(
        parseResult({ kind: 'artifact-update', taskId: 't1', artifact: { parts: [{ kind: 'text', text: 'x' }] } })?.kind
      ).toBe('artifact-update');
    });

    it('should recognise results without a kind by their keys', () => {
      expect(parseResult({ taskId: 't1', status: { state: 'completed' } })?.kind).toBe('status-update');
      expect(parseResult({ id: 't1', status: { state: 'completed' } })?.kind).toBe('task');
      expect(parseResult({ role: 'agent', parts: [{ text: 'hi' }] })?.kind).toBe('message');
    });

    it('should treat null fields as absent', () => {
      const result = parseResult({ kind: 'task', id: 't1', contextId: null, status: { state: 'completed', message: null } });
      expect(result?.kind).toBe('task');
      if (result?.kind !== 'task') return;
      expect(result.contextId).toBeUndefined();
      expect(result.status.message).toBeUndefined();
    });

    it('should return undefined for unreadable payloads', () => {
      expect(parseResult(null)).toBeUndefined();
      expect(parseResult('completed')).toBeUndefined();
      expect(parseResult({ kind: 'task', status: { state: 'completed' } })).toBeUndefined();
      expect(parseResult({ kind: 'mystery' })).toBeUndefined();
      expect(parseResult({ hello: 'world' })).toBeUndefined();
    });
  });

  describe('readNotification', () => {
    it('should read a status update', () => {
      expect(
        readNotification({
          kind: 'status-update',
          taskId: 'r1',
          contextId: 'c1',
          status: { state: 'completed', message: message('agent', 'Done') },
        })
      ).toEqual({ state: 'completed', remoteTaskId: 'r1', contextId: 'c1', text: 'Done' });
    });

    it('should read a task without an id and prefer artifact text', () => {
      expect(
        readNotification({
          status: { state: 'completed', message: message('agent', 'Status') },
          artifacts: [{ parts: [{ kind: 'text', text: 'Artifact' }] }],
        })
      ).toEqual({ state: 'completed', text: 'Artifact' });
    });

    it('should leave out a state that is missing or not a string', () => {
      expect(readNotification({ kind: 'task', id: 'r1', status: {} })).toEqual({ remoteTaskId: 'r1' });
      expect(readNotification({ kind: 'task', id: 'r1', status: { state: 7 } })).toEqual({ remoteTaskId: 'r1' });
      expect(readNotification('completed')).toEqual({});
    });
  });

  describe('parseJsonRpcResponse', () => {
    it('should accept a result or an error', () => {
      expect(parseJsonRpcResponse({ jsonrpc: '2.0', id: 1, result: { ok: true } }).result).toEqual({ ok: true });
      expect(parseJsonRpcResponse({ jsonrpc: '2.0', id: 1, error: { code: -32600, message: 'bad' } }).error?.code).toBe(
        -32600
      );
    });

    it('should reject a body with neither', () => {
      expect(() => parseJsonRpcResponse({ jsonrpc: '2.0', id: 1 })).toThrow(ProtocolRejection);
    });
  });

  describe('parseAgentCard', () => {
    it('should default missing capabilities to none', () => {
      expect(parseAgentCard({ name: 'Writer' }).capabilities).toEqual({});
      expect(parseAgentCard({ name: 'Writer', capabilities: { pushNotifications: true } }).capabilities).toEqual({
        pushNotifications: true,
      });
    });

    it('should reject a card without a name', () => {
      expect(() => parseAgentCard({ capabilities: {} })).toThrow('Malformed agent card');
    });
  });

  describe('text extraction', () => {
    it('should join text parts, including wrapped ones', () => {
      expect(partsText([{ kind: 'text', text: 'a' }, { kind: 'data' }, { root: { text: 'b' } }])).toBe('a\nb');
      expect(partsText([{ kind: 'text', text: '  ' }])).toBeUndefined();
      expect(partsText(undefined)).toBeUndefined();
    });

    it('should prefer the last artifact for the result text', () => {
      const text = extractResultText({
        status: { state: 'completed', message: message('agent', 'status text') },
        history: [message('agent', 'history text')],
        artifacts: [
          { parts: [{ kind: 'text', text: 'first artifact' }] },
          { parts: [{ kind: 'text', text: 'last artifact' }] },
        ],
      });
      expect(text).toBe('last artifact');
    });

    it('should fall back to the last non-user history message, then the status message', () => {
      expect(
        extractResultText({
          status: { state: 'completed', message: message('agent', 'status text') },
          history: [message('agent', 'earlier reply'), message('agent', 'final reply'), message('user', 'thanks')],
        })
      ).toBe('final reply');

      expect(
        extractResultText({
          status: { state: 'completed', message: message('agent', 'status text') },
          history: [message('user', 'question')],
        })
      ).toBe('status text');

      expect(extractResultText({ status: { state: 'completed' } })).toBeUndefined();
    });

    it('should take the first agent message of a submitted task', () => {
      const withStatus: A2ATask = {
        kind: 'task',
        id: 't1',
        status: { state: 'submitted', message: message('agent', 'on it') },
        history: [message('agent', 'hello')],
      };
      expect(firstAgentText(withStatus)).toBe('on it');

      const historyOnly: A2ATask = {
        kind: 'task',
        id: 't1',
        status: { state: 'submitted' },
        history: [message('user', 'do it'), message('agent', 'first'), message('agent', 'second')],
      };
      expect(firstAgentText(historyOnly)).toBe('first');
    });
  });

  describe('readSequenceHint', () => {
    it('should read numeric progress from metadata', () => {
      expect(readSequenceHint({ progress: { current: 2, total: 5 } }, 'working')).toEqual({ current: 2, total: 5 });
    });

    it('should fall back to the stage', () => {
      expect(readSequenceHint(undefined, 'working')).toEqual({ stage: 'working' });
      expect(readSequenceHint({ progress: { current: '2' } }, 'submitted')).toEqual({ stage: 'submitted' });
    });
  });

  describe('request builders', () => {
    it('should build a single-text-part user message', () => {
      const request = buildMessageRequest(
        'message/send',
        'hello',
        { acceptedOutputModes: ['text'], blocking: true },
        { relayTaskId: 'task-1' }
      );

      expect(request.jsonrpc).toBe('2.0');
      expect(request.method).toBe('message/send');
      expect(request.params.message.role).toBe('user');
      expect(request.params.message.parts).toEqual([{ kind: 'text', text: 'hello' }]);
      expect(request.params.configuration).toEqual({ acceptedOutputModes: ['text'], blocking: true });
      expect(request.params.metadata).toEqual({ relayTaskId: 'task-1' });
    });

    it('should build a cancel request for the remote task', () => {
      const request = buildCancelRequest('remote-7');
      expect(request.method).toBe('tasks/cancel');
      expect(request.params).toEqual({ id: 'remote-7' });
    });
  });
});
