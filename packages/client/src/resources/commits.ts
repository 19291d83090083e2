/**
 * Commits Resource API
 */

import { commitSchema, type Commit, type ResourceId } from '@valohai-flow/shared';
import { findFirst, listAll, type ListingRequest } from '../pagination.js';
import type { RequestFn } from '../types.js';
import type { RepositoriesResource } from './repositories.js';

export const LIST_COMMITS_ENDPOINT = 'api/v0/commits/';

/** Newest commits first */
export const DEFAULT_COMMIT_ORDERING = '-commit_time';

export interface CommitsListOptions {
  ordering?: string;
}

/**
 * Commits resource methods
 */
export class CommitsResource {
  constructor(
    private request: RequestFn,
    private pageLimit: number,
    private repositories: RepositoriesResource
  ) {}

  async list(options: CommitsListOptions = {}): Promise<Commit[]> {
    return listAll(this.request, this.listing(options.ordering ?? DEFAULT_COMMIT_ORDERING));
  }

  /**
   * Identifier of the newest commit on `branch` in the project's repository.
   *
   * Resolves to undefined when the project has no repository or the branch
   * has no commits the platform knows of. Call `projects.fetchRepository`
   * first to pick up commits pushed since the last fetch.
   */
  async resolveLatest(projectId: ResourceId, branch: string): Promise<string | undefined> {
    const repositoryId = await this.repositories.resolveId(projectId);
    if (repositoryId === undefined) {
      return undefined;
    }

    const commit = await findFirst(
      this.request,
      this.listing(DEFAULT_COMMIT_ORDERING),
      (c) => c.repository === repositoryId && c.ref === branch
    );
    return commit?.identifier;
  }

  private listing(ordering: string): ListingRequest<Commit> {
    return {
      path: LIST_COMMITS_ENDPOINT,
      item: commitSchema,
      params: { limit: String(this.pageLimit), ordering },
    };
  }
}
