import { describe, expect, it } from 'vitest';
import { Client } from '../src/client.js';
import { createFetchStub, manualClock, ok, sequence, type StubHandler } from './helpers/fetchStub.js';

const project = (id: string, name: string) => ({
  id,
  name,
  ownerId: 'owner-1',
  createdAt: '2024-01-01T00:00:00Z',
  updatedAt: '2024-01-02T00:00:00Z',
});

function makeClient(handler: StubHandler) {
  const stub = createFetchStub(handler);
  const clock = manualClock();
  const client = new Client({
    apiKey: 'test-api-key',
    baseUrl: 'https://api.test',
    maxRetries: 0,
    fetchImpl: stub.fetchImpl,
    clock: clock.now,
  });
  return { client, clock, ...stub };
}

describe('projects', () => {
  it('caches the project list until it expires', async () => {
    const { client, clock, requests } = makeClient(
      sequence(ok({ projects: [project('p1', 'Alpha')] }), ok({ projects: [project('p2', 'Beta')] })),
    );

    const first = await client.projects.list();
    const second = await client.projects.list();
    clock.advance(60_000);
    const third = await client.projects.list();

    expect(first.map((p) => p.id)).toEqual(['p1']);
    expect(second).toEqual(first);
    expect(third.map((p) => p.id)).toEqual(['p2']);
    expect(requests).toHaveLength(2);
  });

  it('bypasses the cache with forceRefresh and honours a per-call ttl', async () => {
    const { client, clock, requests } = makeClient(
      sequence(
        ok({ projects: [project('p1', 'Alpha')] }),
        ok({ projects: [project('p1', 'Alpha 2')] }),
        ok({ projects: [project('p1', 'Alpha 3')] }),
      ),
    );

    await client.projects.list();
    const refreshed = await client.projects.list({ forceRefresh: true, cacheTtlMs: 10 });
    clock.advance(10);
    const expired = await client.projects.list();

    expect(refreshed[0]?.name).toBe('Alpha 2');
    expect(expired[0]?.name).toBe('Alpha 3');
    expect(requests).toHaveLength(3);
  });

  it('finds a project by exact name', async () => {
    const { client } = makeClient(sequence(ok({ projects: [project('p1', 'Alpha'), project('p2', 'alpha')] })));

    expect((await client.projects.getByName('alpha'))?.id).toBe('p2');
    expect(await client.projects.getByName('Gamma')).toBeNull();
  });

  it('sends only the changed fields and invalidates the list on update', async () => {
    const { client, requests } = makeClient(
      sequence(
        ok({ projects: [project('p1', 'Alpha')] }),
        ok({ name: 'Renamed' }),
        ok({ projects: [project('p1', 'Renamed')] }),
      ),
    );

    await client.projects.list();
    const result = await client.projects.update('p1', { name: 'Renamed', color: undefined });
    const after = await client.projects.list();

    expect(result).toEqual({ name: 'Renamed' });
    expect(requests[1]?.method).toBe('PATCH');
    expect(requests[1]?.path).toBe('/api/v1/projects/p1');
    expect(requests[1]?.body).toEqual({ name: 'Renamed' });
    expect(after[0]?.name).toBe('Renamed');
    expect(requests).toHaveLength(3);
  });

  it('drops cached sessions of a deleted project but not of its neighbours', async () => {
    const page = (id: string) => ok({ sessions: [{ id, projectId: 'x', name: id, createdAt: 't', updatedAt: 't' }] });
    const { client, requests } = makeClient(
      sequence(
        page('s1'),
        page('s10'),
        ok({ deletedProject: project('p1', 'Alpha'), deletedAt: '2024-02-01T00:00:00Z' }),
        page('s1-again'),
      ),
    );

    await client.sessions.list('p1');
    await client.sessions.list('p10');
    const deleted = await client.projects.delete('p1');
    const p10 = await client.sessions.list('p10');
    const p1 = await client.sessions.list('p1');

    expect(deleted.deletedAt).toBe('2024-02-01T00:00:00Z');
    expect(p10[0]?.id).toBe('s10');
    expect(p1[0]?.id).toBe('s1-again');
    expect(requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      'GET /api/v1/projects/p1/sessions',
      'GET /api/v1/projects/p10/sessions',
      'DELETE /api/v1/projects/p1',
      'GET /api/v1/projects/p1/sessions',
    ]);
  });

  it('rejects responses that do not match the expected shape', async () => {
    const { client } = makeClient(sequence(ok({ projects: [{ id: 'p1' }] })));

    await expect(client.projects.list()).rejects.toMatchObject({
      code: 'invalid_response',
      message: 'Unexpected response shape: projects.data.projects[0].name must be a string',
    });
  });
});
