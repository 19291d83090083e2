import { z } from 'zod';

// Resource identifiers are UUID strings on the platform; numeric ids are
// accepted so listings from older API versions still validate.
export const resourceIdSchema = z.union([z.string().min(1), z.number().int()]);

export type ResourceId = z.infer<typeof resourceIdSchema>;

// Paginated listing, as returned by every api/v0 list endpoint
export function paginatedResponseSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    count: z.number().int().nonnegative().optional(),
    next: z.string().nullable().optional(),
    previous: z.string().nullable().optional(),
    results: z.array(item),
  });
}

export interface PaginatedResponse<T> {
  count?: number;
  next?: string | null;
  previous?: string | null;
  results: T[];
}

// Platform error body. Validation failures come back as field -> messages maps,
// everything else as { detail } or { message }.
export const apiErrorBodySchema = z
  .object({
    detail: z.string().optional(),
    message: z.string().optional(),
    code: z.string().optional(),
  })
  .passthrough();

export type ApiErrorBody = z.infer<typeof apiErrorBodySchema>;

// Free-form JSON object, for endpoints whose body is only logged
export const jsonObjectSchema = z.record(z.unknown());

export type JsonObject = z.infer<typeof jsonObjectSchema>;
