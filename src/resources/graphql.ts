import { GraphQLError } from '../errors.js';
import type { CachedReadOptions, SearchFilters, SearchResults } from '../types/index.js';
import { requestFingerprint } from '../utils/hash.js';
import { BaseResource } from './base.js';
import { GRAPHQL_PATH } from './paths.js';
import { graphqlResponseNode, searchResultsNode } from './schemas.js';

export const DEFAULT_SEARCH_LIMIT = 200;

export const SEARCH_SESSIONS_QUERY = `
  query SearchSessions($query: String!, $filters: SessionFilters, $limit: Int) {
    searchSessions(query: $query, filters: $filters, limit: $limit) {
      total
      pageInfo {
        hasNextPage
        hasPreviousPage
        startCursor
        endCursor
      }
      results {
        id
        name
        projectId
        projectName
        rank
        highlights
        metadata {
          clientName
          tags
        }
      }
    }
  }
`;

export interface SearchOptions extends CachedReadOptions {
  filters?: SearchFilters | undefined;
  limit?: number | undefined;
}

export class GraphQL extends BaseResource {
  /**
   * Full-text search across sessions. Results are cached under a checksum of the request
   * body, so the same query with the same filters and limit is answered locally.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
    const variables: Record<string, unknown> = { query, limit: options.limit ?? DEFAULT_SEARCH_LIMIT };
    if (options.filters) {
      variables.filters = options.filters;
    }
    const body = { query: SEARCH_SESSIONS_QUERY, variables };
    const key = requestFingerprint('POST', GRAPHQL_PATH, {}, body);

    return this.cached(key, options, async () => {
      const data = await this.execute(body);
      return this.parse(searchResultsNode, data.searchSessions, 'searchSessions');
    });
  }

  /**
   * Runs an arbitrary query and returns its `data`. Never cached.
   */
  async query(query: string, variables: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
    return this.execute({ query, variables });
  }

  private async execute(body: { query: string; variables: Record<string, unknown> }): Promise<Record<string, unknown>> {
    const response = await this.http.request('POST', GRAPHQL_PATH, { body, retryable: true });
    const result = this.parse(graphqlResponseNode, response.body, 'graphql');
    if (result.errors && result.errors.length > 0) {
      throw new GraphQLError(result.errors, { requestId: response.requestId });
    }
    return result.data ?? {};
  }
}
