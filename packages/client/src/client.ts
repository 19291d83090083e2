/**
 * Valohai Client - Main Client Class
 */

import { apiErrorBodySchema } from '@valohai-flow/shared';
import type {
  HttpMethod,
  RequestOptions,
  ResponseSchema,
  ValohaiClientConfig,
} from './types.js';
import {
  ValohaiError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
  ResponseFormatError,
  ServerError,
} from './errors.js';
import { ProjectsResource } from './resources/projects.js';
import { RepositoriesResource } from './resources/repositories.js';
import { CommitsResource } from './resources/commits.js';
import { ExecutionsResource } from './resources/executions.js';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_PAGE_LIMIT = 10000;

/**
 * Build the `https://{host}/` base URL endpoints are resolved against
 */
export function baseUrlFromHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) {
    return `${trimmed}/`;
  }
  return `https://${trimmed}/`;
}

/**
 * Valohai API Client
 *
 * One method per api/v0 request, grouped by resource. Responses are
 * validated, and any non-2xx status is raised as a typed error.
 *
 * @example
 * ```typescript
 * const client = new ValohaiClient({
 *   host: 'app.valohai.com',
 *   token: process.env.VALOHAI_TOKEN,
 * });
 *
 * const projectId = await client.projects.resolveId('my-org/churn-model');
 * const details = await client.executions.get('0177a5c1-2d4e-4cde-a7bd-8d1e4a3c1f10');
 * ```
 */
export class ValohaiClient {
  readonly baseUrl: string;
  private readonly origin: string;
  private token?: string;
  private timeout: number;
  private fetchFn: typeof fetch;

  /** Projects resource */
  public readonly projects: ProjectsResource;

  /** Repositories resource */
  public readonly repositories: RepositoriesResource;

  /** Commits resource */
  public readonly commits: CommitsResource;

  /** Executions resource */
  public readonly executions: ExecutionsResource;

  constructor(config: ValohaiClientConfig) {
    this.baseUrl = baseUrlFromHost(config.host);
    this.origin = new URL(this.baseUrl).origin;
    if (config.token) {
      this.token = config.token;
    }
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = config.fetch ?? fetch;

    const pageLimit = config.pageLimit ?? DEFAULT_PAGE_LIMIT;
    const requestFn = this.request.bind(this);

    this.projects = new ProjectsResource(requestFn, pageLimit);
    this.repositories = new RepositoriesResource(requestFn, pageLimit);
    this.commits = new CommitsResource(requestFn, pageLimit, this.repositories);
    this.executions = new ExecutionsResource(requestFn);
  }

  /**
   * Get headers for requests
   */
  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };

    if (this.token) {
      headers['Authorization'] = `Token ${this.token}`;
    }

    return headers;
  }

  /**
   * Make an HTTP request to the API.
   *
   * `path` is either an endpoint relative to the base URL or an absolute URL
   * returned by the platform (such as a listing's `next` link).
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: ResponseSchema<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = new URL(path, this.baseUrl);
    // Absolute URLs (listing `next` links) must stay on the platform's origin
    if (url.origin !== this.origin) {
      throw new ResponseFormatError(
        `Refusing to request ${url.origin}, expected ${this.origin}`,
        0,
        { url: url.toString() }
      );
    }
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        url.searchParams.set(key, value);
      }
    }

    const headers = this.getHeaders();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url.toString(), {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      const data = this.parseBody(await response.text(), response.ok, response.status);

      if (!response.ok) {
        this.handleError(response, url, data);
      }

      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        throw new ResponseFormatError(
          `Unexpected response from ${method} ${url.pathname}`,
          response.status,
          parsed.error.issues
        );
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof ValohaiError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError('Request timeout');
      }

      throw new NetworkError('Request failed', error instanceof Error ? error : undefined);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Decode a response body. Error responses may legitimately be plain text
   * (proxies, gateways), successful ones must be JSON.
   */
  private parseBody(text: string, ok: boolean, status: number): unknown {
    if (text.length === 0) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      if (!ok) {
        return text;
      }
      throw new ResponseFormatError(
        `Response body is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        status
      );
    }
  }

  /**
   * Handle API error responses
   */
  private handleError(response: Response, url: URL, data: unknown): never {
    const message = errorMessage(response.status, data);

    switch (response.status) {
      case 400:
        throw new ValidationError(message, data);
      case 401:
        throw new AuthenticationError(message);
      case 403:
        throw new PermissionDeniedError(message);
      case 404:
        throw new NotFoundError('Resource', url.pathname);
      case 429:
        throw new RateLimitError(message, retryAfterSeconds(response.headers.get('retry-after')));
      default:
        if (response.status >= 500) {
          throw new ServerError(message, response.status);
        }
        throw new ValohaiError(message, 'HTTP_ERROR', response.status, data);
    }
  }
}

function errorMessage(status: number, data: unknown): string {
  if (typeof data === 'string' && data.trim().length > 0) {
    return data.trim();
  }

  const body = apiErrorBodySchema.safeParse(data);
  if (body.success) {
    if (body.data.detail) return body.data.detail;
    if (body.data.message) return body.data.message;
    return JSON.stringify(body.data);
  }

  return `HTTP ${status}`;
}

function retryAfterSeconds(header: string | null): number | undefined {
  if (header === null) {
    return undefined;
  }
  const seconds = Number.parseInt(header, 10);
  return Number.isNaN(seconds) ? undefined : seconds;
}
