import { describe, it, expect } from 'vitest';
import { sanitizeForLog, SECRET_FIELDS } from '../sanitize.js';

describe('sanitizeForLog', () => {
  it('redacts Bitrix24 auth tokens', () => {
    const result = sanitizeForLog({
      event: 'ONCRMDYNAMICITEMUPDATE',
      auth: {
        domain: 'example.bitrix24.pl',
        application_token: 'test-app-token',
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        member_id: 'test-member',
      },
    });

    expect(result).toEqual({
      event: 'ONCRMDYNAMICITEMUPDATE',
      auth: {
        domain: 'example.bitrix24.pl',
        application_token: '[REDACTED]',
        access_token: '[REDACTED]',
        refresh_token: '[REDACTED]',
        member_id: '[REDACTED]',
      },
    });
  });

  it('summarises arrays without iterating them', () => {
    expect(sanitizeForLog({ ids: ['1', '2', '3'] })).toEqual({ ids: '[Array(3)]' });
  });

  it('passes primitives, null and undefined through', () => {
    expect(sanitizeForLog('text')).toBe('text');
    expect(sanitizeForLog(5)).toBe(5);
    expect(sanitizeForLog(null)).toBeNull();
    expect(sanitizeForLog(undefined)).toBeUndefined();
  });

  it('stops at the depth limit', () => {
    let nested: Record<string, unknown> = { leaf: true };
    for (let i = 0; i < 12; i++) nested = { next: nested };

    let cursor: unknown = sanitizeForLog(nested);
    for (let i = 0; i < 10; i++) {
      expect(cursor).toHaveProperty('next');
      cursor = typeof cursor === 'object' && cursor !== null && 'next' in cursor ? cursor.next : undefined;
    }
    expect(cursor).toBe('[Object]');
  });

  it('covers client_secret', () => {
    expect(SECRET_FIELDS.has('client_secret')).toBe(true);
  });
});
