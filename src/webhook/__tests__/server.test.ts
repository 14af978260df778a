/**
 * Tests for Webhook Server and Health Check
 *
 * All tests use a mocked queue (no Redis connection required).
 * Tests verify HTTP layer behavior: status codes, response shapes,
 * kill switch enforcement, application token checks and what is enqueued.
 */

import { vi, describe, it, expect, beforeEach } from 'vitest';

const { mockEnqueue, mockConfig } = vi.hoisted(() => {
  const mockEnqueue = vi.fn().mockResolvedValue(undefined);
  const bitrix: { domain: string; requestTimeoutMs: number; applicationToken?: string } = {
    domain: 'example.bitrix24.pl',
    requestTimeoutMs: 30000,
  };
  const mockConfig = {
    killSwitch: false,
    isDev: true,
    redis: { url: undefined, host: 'localhost', port: 6379, password: undefined },
    bitrix,
    sync: { dailyEnabled: true },
    server: { port: 3000 },
  };
  return { mockEnqueue, mockConfig };
});

vi.mock('../queue.js', () => ({
  enqueueChangeEvent: mockEnqueue,
  QUEUE_NAME: 'spa-sync-events',
}));

vi.mock('../../config.js', () => ({
  appConfig: mockConfig,
}));

import request from 'supertest';
import { createApp } from '../server.js';

describe('Webhook Server', () => {
  beforeEach(() => {
    mockEnqueue.mockReset();
    mockEnqueue.mockResolvedValue(undefined);
    mockConfig.killSwitch = false;
    mockConfig.bitrix.applicationToken = undefined;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('POST /webhooks/bitrix', () => {
    it('accepts a form-encoded Bitrix24 event and enqueues it', async () => {
      const res = await request(createApp())
        .post('/webhooks/bitrix')
        .type('form')
        .send('event=ONCRMDYNAMICITEMADD&data[FIELDS][ID]=77&data[FIELDS][ENTITY_TYPE_ID]=1042&ts=1760860800')
        .expect(202);

      expect(res.body).toEqual({ accepted: true, relationKind: 'podstawy', operation: 'created' });
      expect(mockEnqueue).toHaveBeenCalledWith({
        relationKind: 'podstawy',
        operation: 'created',
        source: 'webhook',
        childId: '77',
        timestamp: '2025-10-19T08:00:00.000Z',
      });
    });

    it('accepts BizProc query-string calls', async () => {
      const res = await request(createApp())
        .post('/webhooks/bitrix?event=sync_all&contact_id=5')
        .set('X-Request-Id', 'req-42')
        .expect(202);

      expect(res.body).toEqual({ accepted: true, relationKind: 'ALL', operation: 'updated' });
      expect(mockEnqueue.mock.calls[0]?.[0]).toMatchObject({ contactId: '5', source: 'manual', requestId: 'req-42' });
    });

    it('accepts JSON bodies', async () => {
      await request(createApp())
        .post('/webhooks/bitrix')
        .send({ event: 'update', id: 12, entity_type_id: 1110, contact_id: 5 })
        .expect(202);

      expect(mockEnqueue.mock.calls[0]?.[0]).toMatchObject({ relationKind: 'procesy', childId: '12', contactId: '5' });
    });

    it('returns 400 for unusable payloads', async () => {
      const res = await request(createApp()).post('/webhooks/bitrix').send({ event: 'ONCRMDYNAMICITEMADD' }).expect(400);

      expect(res.body).toEqual({ error: 'Missing entity type id' });
      expect(mockEnqueue).not.toHaveBeenCalled();
    });

    it('returns 200 without enqueueing for ignored events', async () => {
      const res = await request(createApp())
        .post('/webhooks/bitrix')
        .send({ event: 'ONCRMDYNAMICITEMUPDATE', data: { FIELDS: { ID: '1', ENTITY_TYPE_ID: '31' } } })
        .expect(200);

      expect(res.body).toEqual({ accepted: false, reason: 'unrelated_entity_type:31' });
      expect(mockEnqueue).not.toHaveBeenCalled();
    });

    it('returns 503 when the kill switch is active', async () => {
      mockConfig.killSwitch = true;

      const res = await request(createApp()).post('/webhooks/bitrix?event=sync_all&contact_id=5').expect(503);

      expect(res.body).toEqual({ message: 'Automation disabled' });
      expect(mockEnqueue).not.toHaveBeenCalled();
    });

    it('returns 401 when the application token does not match', async () => {
      mockConfig.bitrix.applicationToken = 'test-app-token';

      await request(createApp())
        .post('/webhooks/bitrix')
        .type('form')
        .send('event=ONCRMDYNAMICITEMADD&data[FIELDS][ID]=77&data[FIELDS][ENTITY_TYPE_ID]=1042&auth[application_token]=wrong')
        .expect(401);

      expect(mockEnqueue).not.toHaveBeenCalled();
    });

    it('accepts events carrying the configured application token', async () => {
      mockConfig.bitrix.applicationToken = 'test-app-token';

      await request(createApp())
        .post('/webhooks/bitrix')
        .type('form')
        .send('event=ONCRMDYNAMICITEMADD&data[FIELDS][ID]=77&data[FIELDS][ENTITY_TYPE_ID]=1042&auth[application_token]=test-app-token')
        .expect(202);

      expect(mockEnqueue).toHaveBeenCalledTimes(1);
    });

    it('returns 500 when enqueueing fails', async () => {
      mockEnqueue.mockRejectedValueOnce(new Error('Redis unavailable'));

      const res = await request(createApp()).post('/webhooks/bitrix?event=sync_all&parent_id=500').expect(500);

      expect(res.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('GET /health', () => {
    it('returns status and kill switch state', async () => {
      const res = await request(createApp()).get('/health').expect(200);

      expect(res.body).toMatchObject({
        status: 'ok',
        killSwitch: false,
        portal: 'example.bitrix24.pl',
        dailySync: true,
      });
      expect(typeof res.body.timestamp).toBe('string');
    });
  });
});
