import type {
  CachedReadOptions,
  Project,
  ProjectDeleteResult,
  ProjectUpdate,
  ProjectUpdateResult,
} from '../types/index.js';
import { requestFingerprint } from '../utils/hash.js';
import { BaseResource } from './base.js';
import { GRAPHQL_PATH, PROJECTS_PATH, RECENT_SESSIONS_PATH, projectPath } from './paths.js';
import { envelope, projectDeleteNode, projectListNode, projectUpdateNode } from './schemas.js';

const listResponseNode = envelope(projectListNode);
const updateResponseNode = envelope(projectUpdateNode);
const deleteResponseNode = envelope(projectDeleteNode);

export class Projects extends BaseResource {
  async list(options: CachedReadOptions = {}): Promise<Project[]> {
    const key = requestFingerprint('GET', PROJECTS_PATH);
    return this.cached(key, options, async () => {
      const response = await this.http.request('GET', PROJECTS_PATH);
      return this.parse(listResponseNode, response.body, 'projects').data.projects;
    });
  }

  /**
   * Exact, case-sensitive name match over the project list.
   */
  async getByName(name: string, options: CachedReadOptions = {}): Promise<Project | null> {
    const projects = await this.list(options);
    return projects.find((project) => project.name === name) ?? null;
  }

  async update(projectId: string, changes: ProjectUpdate): Promise<ProjectUpdateResult> {
    const path = projectPath(projectId);
    const body: ProjectUpdate = {};
    if (changes.name !== undefined) {
      body.name = changes.name;
    }
    if (changes.icon !== undefined) {
      body.icon = changes.icon;
    }
    if (changes.color !== undefined) {
      body.color = changes.color;
    }

    const response = await this.http.request('PATCH', path, { body });
    this.invalidateProject(projectId);
    return this.parse(updateResponseNode, response.body, 'project update').data;
  }

  async delete(projectId: string): Promise<ProjectDeleteResult> {
    const response = await this.http.request('DELETE', projectPath(projectId));
    this.invalidateProject(projectId);
    return this.parse(deleteResponseNode, response.body, 'project delete').data;
  }

  private invalidateProject(projectId: string): void {
    this.cache.invalidate(requestFingerprint('GET', PROJECTS_PATH));
    this.invalidatePath('GET', RECENT_SESSIONS_PATH);
    this.invalidatePath('POST', GRAPHQL_PATH);
    this.invalidatePath('GET', projectPath(projectId));
  }
}
