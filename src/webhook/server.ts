/**
 * Express Webhook Server
 *
 * HTTP layer for Bitrix24 events. Routes:
 * - POST /webhooks/bitrix — Normalise the event, enqueue to BullMQ
 * - GET /health — Server status and kill switch state
 *
 * The webhook endpoint:
 * 1. Checks kill switch (returns 503 so the caller can retry later)
 * 2. Checks auth[application_token] when B24_APPLICATION_TOKEN is set (401)
 * 3. Normalises form, query or JSON input into a ChangeEvent (400 if unusable)
 * 4. Enqueues and returns 202 Accepted
 *
 * Payloads are sanitized before any console output.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { appConfig } from '../config.js';
import { syncConfig } from '../sync/config.js';
import { enqueueChangeEvent } from './queue.js';
import { extractApplicationToken, normalizeWebhook } from './parse-event.js';
import { sanitizeForLog } from './sanitize.js';
import { healthHandler } from './health.js';

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp() {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', healthHandler);

  app.post('/webhooks/bitrix', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (appConfig.killSwitch) {
        console.log('[webhook] Kill switch active — rejecting webhook');
        res.status(503).json({ message: 'Automation disabled' });
        return;
      }

      const expectedToken = appConfig.bitrix.applicationToken;
      if (expectedToken && extractApplicationToken(req.body) !== expectedToken) {
        console.warn('[webhook] Application token mismatch', sanitizeForLog(req.body));
        res.status(401).json({ error: 'Invalid application token' });
        return;
      }

      const requestId = req.get('x-request-id');
      const result = normalizeWebhook(
        { body: req.body, query: req.query, ...(requestId && { requestId }) },
        syncConfig,
      );

      if (result.kind === 'invalid') {
        console.warn('[webhook] Unusable payload', { error: result.error, body: sanitizeForLog(req.body) });
        res.status(400).json({ error: result.error });
        return;
      }

      if (result.kind === 'ignored') {
        console.log('[webhook] Event ignored', { reason: result.reason });
        res.status(200).json({ accepted: false, reason: result.reason });
        return;
      }

      const { event } = result;
      await enqueueChangeEvent(event);

      console.log('[webhook] Enqueued', {
        relationKind: event.relationKind,
        operation: event.operation,
        childId: event.childId ?? null,
        parentId: event.parentId ?? null,
        contactId: event.contactId ?? null,
      });
      res.status(202).json({ accepted: true, relationKind: event.relationKind, operation: event.operation });
    } catch (err) {
      next(err);
    }
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
