import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { existsSync, rmSync } from 'fs';
import type { Application } from 'express';
import { RelayHttpServer } from '../../src/server.js';
import { createTestConfig, createTestDataDir } from '../fixtures/index.js';
import { a2aTask, respondResult, startFakeAgent, type FakeAgent } from '../fixtures/fakeAgent.js';

/**
 * Executor HTTP surface: task submission as JSON or server-sent events,
 * cancel, the event log, health and metrics
 */

function sseEventNames(text: string): string[] {
  return text
    .split('\n\n')
    .filter(block => block.startsWith('event: '))
    .map(block => block.split('\n')[0].slice('event: '.length));
}

describe('Relay HTTP Server', () => {
  let server: RelayHttpServer;
  let app: Application;
  let agent: FakeAgent;
  let testDataDir: string;

  beforeEach(async () => {
    agent = await startFakeAgent();
    agent.on('message/send', (rpc, res) =>
      respondResult(res, rpc.id, a2aTask('remote-1', 'completed', { text: 'Summary ready' }))
    );

    testDataDir = createTestDataDir();
    server = new RelayHttpServer(createTestConfig(testDataDir, { publicBaseUrl: 'http://relay.local:9090' }));
    await server.initialize();
    app = server.getApp();
  });

  afterEach(async () => {
    await server.stop();
    await agent.close();
    if (existsSync(testDataDir)) {
      rmSync(testDataDir, { recursive: true, force: true });
    }
  });

  describe('Health Check', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.status).toBe('healthy');
      expect(response.body.data.storage).toEqual({ healthy: true, message: 'File storage is operational' });
    });

    it('should echo the correlation id', async () => {
      const response = await request(app).get('/health').set('x-correlation-id', 'corr-123').expect(200);
      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });

    it('should assign a correlation id when none is sent', async () => {
      const response = await request(app).get('/health').expect(200);
      expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  it('should expose Prometheus metrics', async () => {
    const response = await request(app).get('/metrics').expect(200);

    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.text).toContain('# TYPE relay_http_requests_total counter');
  });

  it('should return 404 for unknown routes', async () => {
    const response = await request(app).get('/api/unknown').expect(404);
    expect(response.body).toMatchObject({ success: false, error: 'Not Found' });
  });

  describe('POST /api/tasks', () => {
    it('should run a blocking task and return its events', async () => {
      const response = await request(app)
        .post('/api/tasks')
        .send({ taskId: 'task-1', message: 'Summarise', delivery: 'blocking', agents: [{ endpoint: agent.url }] })
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.task).toMatchObject({ taskId: 'task-1', status: 'completed', mode: 'blocking' });
      expect(response.body.data.events).toHaveLength(2);
      expect(response.body.data.events[0]).toMatchObject({ kind: 'progress', sequenceHint: { stage: 'started' } });
      expect(response.body.data.events[1]).toMatchObject({
        taskId: 'task-1',
        kind: 'completed',
        source: 'executor',
        payload: { text: 'Summary ready', remoteTaskId: 'remote-1' },
      });
    });

    it('should answer 202 for a task awaiting its callback', async () => {
      agent.on('message/send', (rpc, res) => respondResult(res, rpc.id, a2aTask('remote-2', 'submitted')));

      const response = await request(app)
        .post('/api/tasks')
        .send({ taskId: 'task-2', message: 'Summarise', delivery: 'non_blocking', agents: [{ endpoint: agent.url }] })
        .expect(202);

      expect(response.body.data.task.status).toBe('awaiting_callback');
      expect(response.body.data.events.map((event: { kind: string }) => event.kind)).toEqual([
        'progress',
        'accepted',
        'progress',
      ]);
      expect(response.body.data.events[1].payload.callbackUrl).toBe(
        'http://relay.local:9090/webhook/a2a/todolist/task-2'
      );
    });

    it('should report a resolution failure as a failed task', async () => {
      const response = await request(app).post('/api/tasks').send({ message: 'Summarise' }).expect(200);

      expect(response.body.data.task.status).toBe('failed');
      expect(response.body.data.events[0].payload).toMatchObject({ type: 'resolution', code: 'NO_ENDPOINT' });
    });

    it('should stream events when the caller asks for server-sent events', async () => {
      const response = await request(app)
        .post('/api/tasks')
        .set('Accept', 'text/event-stream')
        .send({ taskId: 'task-3', message: 'Summarise', delivery: 'blocking', agents: [{ endpoint: agent.url }] })
        .buffer(true)
        .expect(200);

      expect(response.headers['content-type']).toContain('text/event-stream');
      expect(sseEventNames(response.text)).toEqual(['progress', 'completed', 'done']);
    });

    it('should reject an invalid submission', async () => {
      const response = await request(app).post('/api/tasks').send({ delivery: 'sometimes' }).expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.details.map((detail: { field: string }) => detail.field).sort()).toEqual([
        'delivery',
        'message',
      ]);
    });

    it('should reject a body that is not JSON', async () => {
      const response = await request(app)
        .post('/api/tasks')
        .set('Content-Type', 'application/json')
        .send('{"message": ')
        .expect(400);

      expect(response.body.success).toBe(false);
    });
  });

  describe('POST /api/tasks/:taskId/cancel', () => {
    it('should acknowledge a cancel for a task with no live stream', async () => {
      const response = await request(app)
        .post('/api/tasks/task-4/cancel')
        .send({ contextId: 'ctx-4' })
        .expect(200);

      expect(response.body.data.taskId).toBe('task-4');
      expect(response.body.data.cancelled).toBe(false);
      expect(response.body.data.events).toHaveLength(1);
      expect(response.body.data.events[0]).toMatchObject({
        taskId: 'task-4',
        contextId: 'ctx-4',
        kind: 'progress',
        sequenceHint: { stage: 'cancel_not_applicable' },
      });
    });

    it('should reject a malformed task id', async () => {
      const response = await request(app).post('/api/tasks/bad%20id/cancel').send({}).expect(400);
      expect(response.body.error).toBe('Invalid task id: bad id');
    });
  });

  describe('GET /api/tasks/:taskId/events', () => {
    it('should return the recorded events and terminal event', async () => {
      await request(app)
        .post('/api/tasks')
        .send({ taskId: 'task-5', message: 'Summarise', delivery: 'blocking', agents: [{ endpoint: agent.url }] })
        .expect(200);

      const response = await request(app).get('/api/tasks/task-5/events').expect(200);

      expect(response.body.data.taskId).toBe('task-5');
      expect(response.body.data.events.map((event: { kind: string }) => event.kind)).toEqual(['completed']);
      expect(response.body.data.terminal.kind).toBe('completed');
    });

    it('should return an empty log for an unknown task', async () => {
      const response = await request(app).get('/api/tasks/task-unknown/events').expect(200);

      expect(response.body.data).toEqual({ taskId: 'task-unknown', events: [], terminal: null });
    });
  });
});
