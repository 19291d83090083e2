/**
 * @valohai-flow/shared - payload schemas and status vocabulary
 *
 * @packageDocumentation
 */

export * from './types/api.js';
export * from './types/execution.js';
export * from './types/status.js';
