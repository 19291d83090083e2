/**
 * Executions Resource API
 */

import {
  executionDetailsSchema,
  jsonObjectSchema,
  type ExecutionDetails,
  type ExecutionRequest,
  type ExecutionTagsBody,
  type JsonObject,
  type ResourceId,
} from '@valohai-flow/shared';
import type { RequestFn } from '../types.js';

export const SUBMIT_EXECUTION_ENDPOINT = 'api/v0/executions/';

export function executionDetailsEndpoint(executionId: ResourceId): string {
  return `api/v0/executions/${encodeURIComponent(String(executionId))}/`;
}

export function executionTagsEndpoint(executionId: ResourceId): string {
  return `api/v0/executions/${encodeURIComponent(String(executionId))}/tags/`;
}

/**
 * Executions resource methods
 */
export class ExecutionsResource {
  constructor(private request: RequestFn) {}

  /**
   * Submit a new execution
   */
  async create(request: ExecutionRequest): Promise<ExecutionDetails> {
    const body: ExecutionRequest = {
      project: request.project,
      commit: request.commit,
      step: request.step,
      inputs: request.inputs,
      parameters: request.parameters,
    };
    if (request.environment !== undefined) {
      body.environment = request.environment;
    }

    return this.request('POST', SUBMIT_EXECUTION_ENDPOINT, executionDetailsSchema, { body });
  }

  /**
   * Get execution details by ID
   */
  async get(id: ResourceId): Promise<ExecutionDetails> {
    return this.request('GET', executionDetailsEndpoint(id), executionDetailsSchema);
  }

  /**
   * Attach tags to an execution
   */
  async setTags(id: ResourceId, tags: string[]): Promise<JsonObject> {
    const body: ExecutionTagsBody = { tags };
    return this.request('POST', executionTagsEndpoint(id), jsonObjectSchema, { body });
  }
}
