export interface Project {
  id: string;
  name: string;
  ownerId: string;
  icon?: string | null | undefined;
  color?: string | null | undefined;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectUpdate {
  name?: string | undefined;
  icon?: string | undefined;
  color?: string | undefined;
}

export interface ProjectUpdateResult {
  name?: string | undefined;
  icon?: string | null | undefined;
  color?: string | null | undefined;
}

export interface ProjectDeleteResult {
  deletedProject: Project;
  deletedAt: string;
}

export interface SessionMetadata {
  clientName?: string | null | undefined;
  clientVersion?: string | null | undefined;
  agentName?: string | null | undefined;
  deviceId?: string | null | undefined;
  gitBranches?: string[] | null | undefined;
  llmModels?: string[] | null | undefined;
  tags?: string[] | null | undefined;
}

export interface SessionSummary {
  id: string;
  projectId: string;
  name: string;
  createdAt: string;
  updatedAt: string;
  eventCount?: number | undefined;
  markdownSize?: number | undefined;
  rawDataSize?: number | undefined;
}

export interface SessionEvent {
  timestamp: string;
  type: string;
  data?: unknown;
}

export interface SessionDetail extends SessionSummary {
  projectName?: string | undefined;
  markdown: string;
  rawData: string;
  events?: SessionEvent[] | undefined;
  metadata?: SessionMetadata | undefined;
  startedAt?: string | null | undefined;
  endedAt?: string | null | undefined;
  /** Entity tag the server sent with this representation. */
  etag?: string | undefined;
}

export interface SessionWriteInput {
  name: string;
  markdown: string;
  rawData: string;
  metadata?: SessionMetadata | undefined;
  /** Defaults to `name`; the server creates the project when it does not exist yet. */
  projectName?: string | undefined;
  /** Client-chosen session id. A random UUID is used when omitted. */
  sessionId?: string | undefined;
  idempotencyKey?: string | undefined;
}

export interface SessionWriteResult {
  sessionId: string;
  projectId: string;
  createdAt: string;
  etag?: string | undefined;
}

export interface SessionPage {
  sessions: SessionSummary[];
  nextCursor?: string | null | undefined;
}

export interface SessionHead {
  exists: boolean;
  etag?: string | undefined;
  contentLength?: number | undefined;
  lastModified?: string | undefined;
  markdownSize?: number | undefined;
  rawDataSize?: number | undefined;
}

export interface SearchFilters {
  projectIds?: string[] | undefined;
  startDate?: string | undefined;
  endDate?: string | undefined;
  clientName?: string | undefined;
  tags?: string[] | undefined;
  cursor?: string | undefined;
}

export interface PageInfo {
  hasNextPage: boolean;
  hasPreviousPage: boolean;
  startCursor?: string | null | undefined;
  endCursor?: string | null | undefined;
}

export interface SearchResult {
  id: string;
  name: string;
  projectId: string;
  projectName?: string | undefined;
  rank?: number | undefined;
  highlights?: Record<string, string[]> | undefined;
  metadata?: SessionMetadata | undefined;
}

export interface SearchResults {
  total: number;
  pageInfo?: PageInfo | undefined;
  results: SearchResult[];
}

/**
 * Options shared by every cached read.
 */
export interface CachedReadOptions {
  /** Skip the cache lookup; the fresh response is still stored. */
  forceRefresh?: boolean | undefined;
  /** Freshness window for the stored response instead of the cache default. */
  cacheTtlMs?: number | undefined;
}
