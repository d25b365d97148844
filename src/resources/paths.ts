import { API_PREFIX } from '../constants.js';
import { SDKError } from '../errors.js';

export const PROJECTS_PATH = `${API_PREFIX}/projects`;
export const RECENT_SESSIONS_PATH = `${API_PREFIX}/sessions/recent`;
export const GRAPHQL_PATH = `${API_PREFIX}/graphql`;

export function projectPath(projectId: string): string {
  return `${PROJECTS_PATH}/${encodeSegment(projectId)}`;
}

export function sessionsPath(projectId: string): string {
  return `${projectPath(projectId)}/sessions`;
}

export function sessionPath(projectId: string, sessionId: string): string {
  return `${sessionsPath(projectId)}/${encodeSegment(sessionId)}`;
}

function encodeSegment(value: string): string {
  if (!value) {
    throw new SDKError('Path parameters must be non-empty strings', { code: 'invalid_argument' });
  }
  return encodeURIComponent(value);
}
