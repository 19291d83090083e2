/**
 * @valohai-flow/client - TypeScript client for the Valohai REST API
 *
 * @packageDocumentation
 */

// Main client
export { ValohaiClient, baseUrlFromHost, DEFAULT_TIMEOUT_MS, DEFAULT_PAGE_LIMIT } from './client.js';

// Types
export type {
  ValohaiClientConfig,
  HttpMethod,
  RequestOptions,
  RequestFn,
  ResponseSchema,
} from './types.js';

// Errors
export {
  ValohaiError,
  NetworkError,
  ResponseFormatError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
  ServerError,
} from './errors.js';

// Pagination
export { iteratePages, listAll, findFirst } from './pagination.js';
export type { ListingRequest } from './pagination.js';

// Resources
export { ProjectsResource, LIST_PROJECTS_ENDPOINT, fetchRepositoryEndpoint } from './resources/projects.js';
export { RepositoriesResource, LIST_REPOSITORIES_ENDPOINT } from './resources/repositories.js';
export {
  CommitsResource,
  LIST_COMMITS_ENDPOINT,
  DEFAULT_COMMIT_ORDERING,
} from './resources/commits.js';
export type { CommitsListOptions } from './resources/commits.js';
export {
  ExecutionsResource,
  SUBMIT_EXECUTION_ENDPOINT,
  executionDetailsEndpoint,
  executionTagsEndpoint,
} from './resources/executions.js';
