import { z } from 'zod';
import { resourceIdSchema } from './api.js';

// Project
export const projectSchema = z
  .object({
    id: resourceIdSchema,
    name: z.string(),
  })
  .passthrough();

export type Project = z.infer<typeof projectSchema>;

// Repository (the platform's mirror of a project's git remote)
export const repositorySchema = z
  .object({
    id: resourceIdSchema,
    project: z
      .object({
        id: resourceIdSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type Repository = z.infer<typeof repositorySchema>;

// Commit
export const commitSchema = z
  .object({
    identifier: z.string().min(1),
    repository: resourceIdSchema,
    ref: z.string(),
    commit_time: z.string().nullable().optional(),
  })
  .passthrough();

export type Commit = z.infer<typeof commitSchema>;

// Execution inputs map an input name to one URL or a list of URLs
export const executionInputsSchema = z.record(z.union([z.string(), z.array(z.string())]));

export type ExecutionInputs = z.infer<typeof executionInputsSchema>;

export const executionParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type ExecutionParameterValue = z.infer<typeof executionParameterValueSchema>;

export const executionParametersSchema = z.record(executionParameterValueSchema);

export type ExecutionParameters = z.infer<typeof executionParametersSchema>;

// Execution submission body (POST api/v0/executions/)
export const executionRequestSchema = z.object({
  project: resourceIdSchema,
  commit: z.string().min(1),
  step: z.string().min(1),
  inputs: executionInputsSchema,
  parameters: executionParametersSchema,
  environment: z.string().min(1).optional(),
});

export type ExecutionRequest = z.infer<typeof executionRequestSchema>;

// Execution output, the url is pre-signed and needs no Authorization header
export const executionOutputSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().url(),
  })
  .passthrough();

export type ExecutionOutput = z.infer<typeof executionOutputSchema>;

// Execution details (GET api/v0/executions/{id}/)
export const executionDetailsSchema = z
  .object({
    id: resourceIdSchema,
    status: z.string(),
    urls: z
      .object({
        display: z.string(),
      })
      .passthrough(),
    outputs: z.array(executionOutputSchema).default([]),
  })
  .passthrough();

export type ExecutionDetails = z.infer<typeof executionDetailsSchema>;

// Tags (POST api/v0/executions/{id}/tags/)
export const executionTagsBodySchema = z.object({
  tags: z.array(z.string().min(1)),
});

export type ExecutionTagsBody = z.infer<typeof executionTagsBodySchema>;
