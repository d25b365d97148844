import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Client } from '../src/client.js';
import { exportProjectSessions } from '../src/export/sessionExporter.js';
import { createFetchStub, ok, type RecordedRequest, type StubResponse } from './helpers/fetchStub.js';

const summary = (id: string, name: string) => ({
  id,
  projectId: 'p1',
  name,
  createdAt: 't',
  updatedAt: 't',
});

function route(request: RecordedRequest): StubResponse {
  switch (request.path) {
    case '/api/v1/projects/p1/sessions':
      return ok({ sessions: [summary('s1', 'First Steps'), summary('s2', 'Deploy: Prod!')], nextCursor: 'c2' });
    case '/api/v1/projects/p1/sessions?cursor=c2':
      return ok({ sessions: [summary('s3', '')] });
    default: {
      const id = request.path.split('/').pop() ?? '';
      const name = id === 's1' ? 'First Steps' : id === 's2' ? 'Deploy: Prod!' : '';
      return ok({ session: { ...summary(id, name), markdown: `# ${id}`, rawData: '{}' } });
    }
  }
}

describe('exportProjectSessions', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(path.join(os.tmpdir(), 'session-export-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('writes every session of every page as markdown', async () => {
    const stub = createFetchStub(route);
    const client = new Client({ apiKey: 'test-api-key', baseUrl: 'https://api.test', fetchImpl: stub.fetchImpl });
    const messages: string[] = [];

    const files = await exportProjectSessions(client, 'p1', {
      outDir,
      concurrency: 2,
      logger: (message) => messages.push(message),
    });

    expect(files).toEqual([
      path.join(outDir, 'first-steps-s1.md'),
      path.join(outDir, 'deploy-prod-s2.md'),
      path.join(outDir, 'untitled-s3.md'),
    ]);
    expect((await readdir(outDir)).sort()).toEqual(['deploy-prod-s2.md', 'first-steps-s1.md', 'untitled-s3.md']);
    expect(await readFile(path.join(outDir, 'deploy-prod-s2.md'), 'utf8')).toBe('# s2');
    expect(messages[0]).toBe('Exporting 3 sessions from project p1');
    expect(stub.requests).toHaveLength(5);
  });

  it('rejects a non-positive concurrency', async () => {
    const client = new Client({ apiKey: 'test-api-key', baseUrl: 'https://api.test', fetchImpl: createFetchStub(route).fetchImpl });

    await expect(exportProjectSessions(client, 'p1', { outDir, concurrency: 0 })).rejects.toThrow(
      'concurrency must be a positive integer (received 0)',
    );
  });

  it('keeps server-supplied ids inside the output directory', async () => {
    const escaping = summary('../escape', 'Notes');
    const stub = createFetchStub((request) =>
      request.path.endsWith('/sessions')
        ? ok({ sessions: [escaping] })
        : ok({ session: { ...escaping, markdown: '# escaped', rawData: '{}' } }),
    );
    const client = new Client({ apiKey: 'test-api-key', baseUrl: 'https://api.test', fetchImpl: stub.fetchImpl });

    const files = await exportProjectSessions(client, 'p1', { outDir });

    expect(files).toEqual([path.join(outDir, 'notes-..%2Fescape.md')]);
    expect(await readdir(outDir)).toEqual(['notes-..%2Fescape.md']);
    expect(stub.requests[1]?.path).toBe('/api/v1/projects/p1/sessions/..%2Fescape');
  });
});
