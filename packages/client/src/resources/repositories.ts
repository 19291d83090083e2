/**
 * Repositories Resource API
 */

import { repositorySchema, type Repository, type ResourceId } from '@valohai-flow/shared';
import { findFirst, listAll, type ListingRequest } from '../pagination.js';
import type { RequestFn } from '../types.js';

export const LIST_REPOSITORIES_ENDPOINT = 'api/v0/repositories/';

/**
 * Repositories resource methods
 */
export class RepositoriesResource {
  constructor(
    private request: RequestFn,
    private pageLimit: number
  ) {}

  async list(): Promise<Repository[]> {
    return listAll(this.request, this.listing());
  }

  /**
   * Id of the repository that belongs to `projectId`
   */
  async resolveId(projectId: ResourceId): Promise<ResourceId | undefined> {
    const repository = await findFirst(
      this.request,
      this.listing(),
      (r) => r.project.id === projectId
    );
    return repository?.id;
  }

  private listing(): ListingRequest<Repository> {
    return {
      path: LIST_REPOSITORIES_ENDPOINT,
      item: repositorySchema,
      params: { limit: String(this.pageLimit) },
    };
  }
}
