import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { existsSync, rmSync } from 'fs';
import { RelayHttpServer } from '../../src/server.js';
import { WebhookHttpServer } from '../../src/webhookServer.js';
import { createTestConfig, createTestDataDir } from '../fixtures/index.js';
import { a2aTask, respondResult, startFakeAgent, statusUpdate, type FakeAgent } from '../fixtures/fakeAgent.js';
import { isRecord } from '../../src/types/index.js';

/**
 * Non-blocking round trip: the executor dispatches with a callback URL and
 * returns; the receiver, a separate server over the same data directory,
 * records the outcome when the target calls back.
 */
describe('Webhook flow', () => {
  let agent: FakeAgent;
  let executor: RelayHttpServer;
  let receiver: WebhookHttpServer;
  let testDataDir: string;
  let callbackUrls: string[];

  beforeEach(async () => {
    callbackUrls = [];
    agent = await startFakeAgent();
    agent.on('message/send', (rpc, res) => {
      const params = rpc.params;
      if (isRecord(params) && isRecord(params.configuration) && isRecord(params.configuration.pushNotificationConfig)) {
        const url = params.configuration.pushNotificationConfig.url;
        if (typeof url === 'string') callbackUrls.push(url);
      }
      respondResult(res, rpc.id, a2aTask('remote-flow', 'submitted', { text: 'Queued' }));
    });

    testDataDir = createTestDataDir();
    const config = createTestConfig(testDataDir, { publicBaseUrl: 'http://relay.local:9090' });
    executor = new RelayHttpServer(config);
    receiver = new WebhookHttpServer(config);
    await executor.initialize();
    await receiver.initialize();
  });

  afterEach(async () => {
    await executor.stop();
    await receiver.stop();
    await agent.close();
    if (existsSync(testDataDir)) {
      rmSync(testDataDir, { recursive: true, force: true });
    }
  });

  it('should record one terminal event for duplicate deliveries', async () => {
    const submitted = await request(executor.getApp())
      .post('/api/tasks')
      .send({ taskId: 'task-flow', message: 'Summarise', delivery: 'non_blocking', agents: [{ endpoint: agent.url }] })
      .expect(202);

    expect(submitted.body.data.task.status).toBe('awaiting_callback');
    expect(callbackUrls).toEqual(['http://relay.local:9090/webhook/a2a/todolist/task-flow']);

    const callbackPath = new URL(callbackUrls[0]).pathname;
    const notification = statusUpdate('remote-flow', 'completed', { text: 'Quarter summarised', final: true });

    const first = await request(receiver.getApp()).post(callbackPath).send(notification).expect(200);
    const second = await request(receiver.getApp()).post(callbackPath).send(notification).expect(200);

    expect(first.body.data).toMatchObject({ recorded: true, correlation: 'matched' });
    expect(second.body.data.recorded).toBe(false);

    const log = await request(executor.getApp()).get('/api/tasks/task-flow/events').expect(200);
    expect(log.body.data.events.map((event: { kind: string }) => event.kind)).toEqual(['accepted', 'completed']);
    expect(log.body.data.terminal).toMatchObject({
      kind: 'completed',
      source: 'receiver',
      payload: { text: 'Quarter summarised', remoteTaskId: 'remote-flow' },
    });
  });

  it('should keep the first outcome when a late failure follows a completion', async () => {
    await request(executor.getApp())
      .post('/api/tasks')
      .send({ taskId: 'task-late', message: 'Summarise', delivery: 'non_blocking', agents: [{ endpoint: agent.url }] })
      .expect(202);

    const callbackPath = '/webhook/a2a/todolist/task-late';
    await request(receiver.getApp())
      .post(callbackPath)
      .send(a2aTask('remote-flow', 'completed', { text: 'First' }))
      .expect(200);
    await request(receiver.getApp())
      .post(callbackPath)
      .send(a2aTask('remote-flow', 'failed', { text: 'Second' }))
      .expect(200);

    const log = await request(executor.getApp()).get('/api/tasks/task-late/events').expect(200);
    expect(log.body.data.terminal.kind).toBe('completed');
    expect(log.body.data.terminal.payload.text).toBe('First');
  });
});
