import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { createApp } from '../src/app';
import { FileCheckpointStore } from '../src/persistence/checkpoints';
import { createHarness, inbound } from './helpers';

function appWithHarness() {
  const harness = createHarness();
  return { ...harness, app: createApp(harness.engine, { sha: 'test-sha' }) };
}

describe('GET /healthz', () => {
  it('returns 200 with service name and sha', async () => {
    const { app } = appWithHarness();
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ service: 'orchestrator', sha: 'test-sha', status: 'ok' });
  });

  it('echoes the correlation id', async () => {
    const { app } = appWithHarness();
    const res = await request(app).get('/healthz').set('x-correlation-id', 'corr-42');
    expect(res.headers['x-correlation-id']).toBe('corr-42');
  });
});

describe('conversation routes', () => {
  it('runs a message to review, lists it and completes it on accept', async () => {
    const { app, mail } = appWithHarness();

    const created = await request(app).post('/conversations').send(inbound());
    expect(created.status).toBe(201);
    expect(created.body.kind).toBe('interrupted');
    expect(created.body.status).toBe('awaiting_review');
    expect(created.body.epoch).toBe(0);
    expect(created.body.interrupt.node).toBe('review');
    expect(created.body.draft_output).toBe(
      'Hello,\n\nThank you for your message about: Question about the product\n\nBest regards,\nInbox Assistant',
    );

    const id: string = created.body.conversation_id;
    const pending = await request(app).get('/interrupts');
    expect(pending.status).toBe(200);
    expect(pending.body.count).toBe(1);
    expect(pending.body.interrupts[0].conversation_id).toBe(id);

    const resumed = await request(app).post(`/conversations/${id}/resume`).send({ type: 'accept' });
    expect(resumed.status).toBe(200);
    expect(resumed.body.kind).toBe('finished');
    expect(resumed.body.status).toBe('completed');
    expect(resumed.body.interrupt).toBeNull();
    expect(mail.sent).toHaveLength(1);

    const fetched = await request(app).get(`/conversations/${id}`);
    expect(fetched.status).toBe(200);
    expect(fetched.body.status).toBe('completed');
    expect(fetched.body.delivery.message_id).toBe('msg-1');
  });

  it('rejects a malformed human response', async () => {
    const { app } = appWithHarness();
    const created = await request(app).post('/conversations').send(inbound());

    const res = await request(app)
      .post(`/conversations/${created.body.conversation_id}/resume`)
      .set('x-correlation-id', 'corr-7')
      .send({ type: 'maybe' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid human response');
    expect(res.body.details).toHaveLength(1);
    expect(res.body.correlation_id).toBe('corr-7');
  });

  it('rejects feedback without text', async () => {
    const { app } = appWithHarness();
    const created = await request(app).post('/conversations').send(inbound());

    const res = await request(app).post(`/conversations/${created.body.conversation_id}/resume`).send({ type: 'response' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("'response' needs feedback text in args");
  });

  it('returns 404 for an unknown conversation', async () => {
    const { app } = appWithHarness();
    const res = await request(app).get('/conversations/unknown');
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Conversation unknown not found');
  });

  it('returns 400 for a body that is not JSON', async () => {
    const { app } = appWithHarness();
    const res = await request(app).post('/conversations').set('content-type', 'application/json').send('{"message_id":');
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('invalid_json');
  });

  it('reports an empty expiry sweep', async () => {
    const { app } = appWithHarness();
    await request(app).post('/conversations').send(inbound());
    const res = await request(app).post('/interrupts/expire');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ expired: 0, results: [] });
  });
});

describe('conversation routes on file checkpoints', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'orchestrator-http-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('answers 400 for an id that cannot name a checkpoint', async () => {
    const harness = createHarness({ checkpoints: new FileCheckpointStore(dir) });
    const app = createApp(harness.engine, { sha: 'test-sha' });

    const res = await request(app).get('/conversations/a.b').set('x-correlation-id', 'corr-9');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid conversation id: a.b', details: [], correlation_id: 'corr-9' });
  });

  it('answers 404 for a well-formed id with no checkpoint', async () => {
    const harness = createHarness({ checkpoints: new FileCheckpointStore(dir) });
    const res = await request(createApp(harness.engine)).get('/conversations/missing-1');
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Conversation missing-1 not found');
  });
});
