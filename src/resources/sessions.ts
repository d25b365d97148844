import { randomUUID } from 'node:crypto';
import type {
  CachedReadOptions,
  SessionDetail,
  SessionHead,
  SessionPage,
  SessionSummary,
  SessionWriteInput,
  SessionWriteResult,
} from '../types/index.js';
import { requestFingerprint } from '../utils/hash.js';
import { BaseResource } from './base.js';
import {
  GRAPHQL_PATH,
  PROJECTS_PATH,
  RECENT_SESSIONS_PATH,
  sessionPath,
  sessionsPath,
} from './paths.js';
import { envelope, sessionEnvelopeNode, sessionPageNode, sessionWriteNode } from './schemas.js';

export const DEFAULT_RECENT_LIMIT = 10;

export interface ListSessionsOptions extends CachedReadOptions {
  pageSize?: number | undefined;
  cursor?: string | undefined;
}

export interface ReadSessionOptions extends CachedReadOptions {
  /**
   * Conditional read against a known ETag: resolves to `null` when the server answers
   * 304. The cache is bypassed for the lookup but a changed session is still stored.
   */
  ifNoneMatch?: string | undefined;
  /**
   * Revalidate a cached copy with its stored ETag instead of trusting it until expiry.
   */
  revalidate?: boolean | undefined;
}

export interface RecentSessionsOptions extends CachedReadOptions {
  limit?: number | undefined;
}

const writeResponseNode = envelope(sessionWriteNode);
const pageResponseNode = envelope(sessionPageNode);
const readResponseNode = envelope(sessionEnvelopeNode);

export class Sessions extends BaseResource {
  async write(projectId: string, input: SessionWriteInput): Promise<SessionWriteResult> {
    const sessionId = input.sessionId ?? randomUUID();
    const body: Record<string, unknown> = {
      name: input.name,
      markdown: input.markdown,
      rawData: input.rawData,
      projectName: input.projectName ?? input.name,
    };
    if (input.metadata) {
      body.metadata = input.metadata;
    }

    const response = await this.http.request('PUT', sessionPath(projectId, sessionId), {
      body,
      idempotencyKey: input.idempotencyKey,
    });
    this.invalidateSession(projectId, sessionId);

    const result = this.parse(writeResponseNode, response.body, 'session write').data;
    const etag = response.headers.get('etag');
    return etag ? { ...result, etag } : result;
  }

  async list(projectId: string, options: ListSessionsOptions = {}): Promise<SessionSummary[]> {
    const page = await this.listPage(projectId, options);
    return page.sessions;
  }

  /**
   * Walks every page of a project's sessions, following `nextCursor` until the server
   * stops returning one.
   */
  async *listPaginated(
    projectId: string,
    options: Omit<ListSessionsOptions, 'cursor'> = {},
  ): AsyncGenerator<SessionSummary, void, undefined> {
    let cursor: string | undefined;
    do {
      const page = await this.listPage(projectId, { ...options, cursor });
      yield* page.sessions;
      cursor = page.nextCursor ?? undefined;
    } while (cursor);
  }

  async read(projectId: string, sessionId: string, options: ReadSessionOptions = {}): Promise<SessionDetail | null> {
    const path = sessionPath(projectId, sessionId);
    const key = requestFingerprint('GET', path);
    const epoch = this.cache.epoch;

    if (options.ifNoneMatch) {
      const response = await this.http.request('GET', path, {
        headers: { 'If-None-Match': options.ifNoneMatch },
      });
      if (response.status === 304) {
        return null;
      }
      return this.storeSession(key, response, options, epoch);
    }

    const cached = options.forceRefresh ? null : this.cache.get<SessionDetail>(key);
    if (cached && !(options.revalidate && cached.validator)) {
      return cached.value;
    }

    const response = await this.http.request('GET', path, {
      headers: cached?.validator ? { 'If-None-Match': cached.validator } : undefined,
    });
    if (response.status === 304 && cached) {
      this.store(key, cached.value, { validator: cached.validator, ttlMs: options.cacheTtlMs, epoch });
      return cached.value;
    }
    if (response.status === 304) {
      return null;
    }
    return this.storeSession(key, response, options, epoch);
  }

  async delete(projectId: string, sessionId: string): Promise<boolean> {
    await this.http.request('DELETE', sessionPath(projectId, sessionId));
    this.invalidateSession(projectId, sessionId);
    return true;
  }

  /**
   * Existence and size information without downloading the session body.
   */
  async head(projectId: string, sessionId: string): Promise<SessionHead> {
    const response = await this.http.request('HEAD', sessionPath(projectId, sessionId), {
      acceptStatus: [404],
    });
    if (response.status === 404) {
      return { exists: false };
    }

    const headers = response.headers;
    const head: SessionHead = { exists: true };
    const etag = headers.get('etag');
    const lastModified = headers.get('last-modified');
    const contentLength = parseIntegerHeader(headers.get('content-length'));
    const markdownSize = parseIntegerHeader(headers.get('x-markdown-size'));
    const rawDataSize = parseIntegerHeader(headers.get('x-raw-data-size'));
    if (etag) head.etag = etag;
    if (lastModified) head.lastModified = lastModified;
    if (contentLength !== undefined) head.contentLength = contentLength;
    if (markdownSize !== undefined) head.markdownSize = markdownSize;
    if (rawDataSize !== undefined) head.rawDataSize = rawDataSize;
    return head;
  }

  /**
   * Most recently updated sessions across every project.
   */
  async recent(options: RecentSessionsOptions = {}): Promise<SessionSummary[]> {
    const query = { limit: options.limit ?? DEFAULT_RECENT_LIMIT };
    const key = requestFingerprint('GET', RECENT_SESSIONS_PATH, query);
    return this.cached(key, options, async () => {
      const response = await this.http.request('GET', RECENT_SESSIONS_PATH, { query });
      return this.parse(pageResponseNode, response.body, 'recent sessions').data.sessions;
    });
  }

  /**
   * Writes a session and reads back the stored representation, bypassing the cache.
   */
  async writeAndRead(projectId: string, input: SessionWriteInput): Promise<SessionDetail | null> {
    const written = await this.write(projectId, input);
    return this.read(written.projectId, written.sessionId, { forceRefresh: true });
  }

  private async listPage(projectId: string, options: ListSessionsOptions): Promise<SessionPage> {
    const path = sessionsPath(projectId);
    const query = { limit: options.pageSize, cursor: options.cursor };
    const key = requestFingerprint('GET', path, query);
    return this.cached(key, options, async () => {
      const response = await this.http.request('GET', path, { query });
      return this.parse(pageResponseNode, response.body, 'sessions').data;
    });
  }

  private storeSession(
    key: string,
    response: { body: unknown; headers: Headers },
    options: CachedReadOptions,
    epoch: number,
  ): SessionDetail {
    const session = this.parse(readResponseNode, response.body, 'session').data.session;
    const etag = response.headers.get('etag') ?? undefined;
    const result: SessionDetail = etag ? { ...session, etag } : session;
    this.store(key, result, { validator: etag, ttlMs: options.cacheTtlMs, epoch });
    return result;
  }

  private invalidateSession(projectId: string, sessionId: string): void {
    this.cache.invalidate(requestFingerprint('GET', sessionPath(projectId, sessionId)));
    this.cache.invalidate(requestFingerprint('GET', PROJECTS_PATH));
    this.invalidatePath('GET', sessionsPath(projectId));
    this.invalidatePath('GET', RECENT_SESSIONS_PATH);
    this.invalidatePath('POST', GRAPHQL_PATH);
  }
}

function parseIntegerHeader(value: string | null): number | undefined {
  if (value === null) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}
