import { describe, expect, it } from 'vitest';
import { jot } from '../src/jot.js';
import { requestFingerprint } from '../src/utils/hash.js';
import { slugify } from '../src/utils/text.js';

describe('jot', () => {
  const session = jot.object({
    id: jot.string(),
    size: jot.optional(jot.number()),
    tags: jot.array(jot.string()),
    endedAt: jot.nullable(jot.string()),
    kind: jot.enum(['chat', 'agent'] as const),
  });

  it('parses a matching value and drops undeclared keys', () => {
    expect(session.parse({ id: 's1', tags: ['a'], endedAt: null, kind: 'chat', extra: true })).toEqual({
      id: 's1',
      tags: ['a'],
      endedAt: null,
      kind: 'chat',
    });
  });

  it('names the failing path', () => {
    expect(() => session.parse({ id: 's1', tags: ['a', 3], endedAt: null, kind: 'chat' }, 'session')).toThrow(
      'session.tags[1] must be a string',
    );
    expect(() => session.parse({ id: 's1', tags: [], endedAt: null, kind: 'other' })).toThrow(
      'value.kind must be one of chat, agent',
    );
  });

  it('keeps unknown keys in passthrough mode', () => {
    const loose = jot.object({ id: jot.string() }, { passthrough: true });
    expect(loose.parse({ id: 'p1', color: 'red' })).toEqual({ id: 'p1', color: 'red' });
  });

  it('checks literals and records', () => {
    expect(() => jot.literal(true).parse(false, 'success')).toThrow('success must be true');
    expect(jot.record(jot.number()).parse({ a: 1 })).toEqual({ a: 1 });
    expect(() => jot.record(jot.number()).parse([])).toThrow('value must be an object');
  });
});

describe('requestFingerprint', () => {
  it('sorts query parameters and drops undefined ones', () => {
    expect(requestFingerprint('get', '/api/v1/sessions/recent', { limit: 10, cursor: undefined, a: 'x' })).toBe(
      'GET /api/v1/sessions/recent?a=x&limit=10',
    );
  });

  it('hashes bodies independently of key order', () => {
    const left = requestFingerprint('POST', '/api/v1/graphql', {}, { query: 'q', variables: { a: 1, b: 2 } });
    const right = requestFingerprint('POST', '/api/v1/graphql', {}, { variables: { b: 2, a: 1 }, query: 'q' });

    expect(left).toBe(right);
    expect(left).toMatch(/^POST \/api\/v1\/graphql#[0-9a-f]{64}$/);
  });
});

describe('slugify', () => {
  it('builds file-name friendly slugs', () => {
    expect(slugify('  Fix the  Login Bug! ')).toBe('fix-the-login-bug');
    expect(slugify('***')).toBe('untitled');
  });
});
