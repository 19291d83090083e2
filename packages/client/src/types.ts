/**
 * Valohai Client Type Definitions
 */

import type { z } from 'zod';

// Client configuration
export interface ValohaiClientConfig {
  /** Platform host, e.g. `app.valohai.com`. A full `https://` URL is accepted too. */
  host: string;
  /** API token, sent as `Authorization: Token <token>` */
  token?: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** `limit` sent with list requests (default: 10000) */
  pageLimit?: number;
  fetch?: typeof fetch;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
  body?: unknown;
  params?: Record<string, string>;
}

/**
 * Schema a response body is validated against. The input side is left open
 * so schemas with defaults and passthrough objects fit.
 */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type RequestFn = <T>(
  method: HttpMethod,
  path: string,
  schema: ResponseSchema<T>,
  options?: RequestOptions
) => Promise<T>;
