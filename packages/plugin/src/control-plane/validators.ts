import { z, type ZodError } from 'zod';
import type { ExecutionInputs, ExecutionParameters } from '@valohai-flow/shared';
import { TaskConfigurationError } from '../errors.js';

/**
 * Commander collector for repeatable options.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Split `name=value`. The value may itself contain `=`.
 */
export function parseKeyValue(raw: string, optionName: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0) {
    throw new TaskConfigurationError(`Invalid ${optionName} "${raw}", expected name=value`);
  }
  return [raw.slice(0, index).trim(), raw.slice(index + 1)];
}

/**
 * Build execution inputs from `name=url` pairs. Repeating a name collects
 * its URLs into a list.
 */
export function parseInputs(pairs: string[]): ExecutionInputs {
  const inputs: ExecutionInputs = {};
  for (const pair of pairs) {
    const [name, url] = parseKeyValue(pair, '--input');
    const existing = inputs[name];
    if (existing === undefined) {
      inputs[name] = url;
    } else if (Array.isArray(existing)) {
      existing.push(url);
    } else {
      inputs[name] = [existing, url];
    }
  }
  return inputs;
}

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/**
 * Coerce a command-line parameter value: numbers and booleans become
 * typed values, everything else stays a string. Numbers a double cannot
 * hold exactly (integers past 2^53, overflowing exponents) stay strings.
 */
export function coerceParameterValue(raw: string): string | number | boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;

  const trimmed = raw.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    const value = Number(trimmed);
    return Number.isSafeInteger(value) ? value : raw;
  }
  if (DECIMAL_PATTERN.test(trimmed)) {
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : raw;
  }
  return raw;
}

export function parseParameters(pairs: string[]): ExecutionParameters {
  const parameters: ExecutionParameters = {};
  for (const pair of pairs) {
    const [name, value] = parseKeyValue(pair, '--param');
    parameters[name] = coerceParameterValue(value);
  }
  return parameters;
}

const secondsSchema = z.coerce.number().finite().min(0);

/**
 * Parse a duration given in seconds into milliseconds.
 */
export function parseSecondsToMs(raw: string | undefined, optionName: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const result = secondsSchema.safeParse(raw);
  if (!result.success) {
    throw new TaskConfigurationError(
      `Invalid ${optionName} "${raw}": ${formatZodErrors(result.error)}`
    );
  }
  return Math.round(result.data * 1000);
}

/**
 * Run and task ids end up in file names.
 */
export const taskIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must start with a letter or digit and contain only letters, digits, ".", "_" or "-"');

export function validateTaskId(value: string, optionName: string): string {
  const result = taskIdSchema.safeParse(value);
  if (!result.success) {
    throw new TaskConfigurationError(`Invalid ${optionName} "${value}": ${formatZodErrors(result.error)}`);
  }
  return result.data;
}

function formatZodErrors(error: ZodError): string {
  return error.errors.map((e) => e.message).join('; ');
}
