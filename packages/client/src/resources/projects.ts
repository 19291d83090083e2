/**
 * Projects Resource API
 */

import {
  jsonObjectSchema,
  projectSchema,
  type JsonObject,
  type Project,
  type ResourceId,
} from '@valohai-flow/shared';
import { findFirst, listAll, type ListingRequest } from '../pagination.js';
import type { RequestFn } from '../types.js';

export const LIST_PROJECTS_ENDPOINT = 'api/v0/projects/';

export function fetchRepositoryEndpoint(projectId: ResourceId): string {
  return `api/v0/projects/${encodeURIComponent(String(projectId))}/fetch/`;
}

/**
 * Projects resource methods
 */
export class ProjectsResource {
  constructor(
    private request: RequestFn,
    private pageLimit: number
  ) {}

  /**
   * List all projects visible to the token
   */
  async list(): Promise<Project[]> {
    return listAll(this.request, this.listing());
  }

  /**
   * Id of the first project whose name equals `name` exactly
   */
  async resolveId(name: string): Promise<ResourceId | undefined> {
    const project = await findFirst(this.request, this.listing(), (p) => p.name === name);
    return project?.id;
  }

  /**
   * Make the platform fetch the latest commits of the project's repository
   */
  async fetchRepository(projectId: ResourceId): Promise<JsonObject> {
    return this.request('POST', fetchRepositoryEndpoint(projectId), jsonObjectSchema);
  }

  private listing(): ListingRequest<Project> {
    return {
      path: LIST_PROJECTS_ENDPOINT,
      item: projectSchema,
      params: { limit: String(this.pageLimit) },
    };
  }
}
