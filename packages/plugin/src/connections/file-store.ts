/**
 * Connections kept in a YAML file:
 *
 * ```yaml
 * valohai_default:
 *   host: app.valohai.com
 *   token: <api token>
 * valohai_staging:
 *   host: staging.valohai.com
 *   extra:
 *     token: <api token>
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConnectionNotFoundError, TaskConfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { Connection, ConnectionStore } from './types.js';

const log = createLogger('connections:file');

const connectionEntrySchema = z.object({
  host: z.string().min(1),
  token: z.string().min(1).optional(),
  extra: z
    .object({
      token: z.string().min(1).optional(),
    })
    .passthrough()
    .optional(),
});

const connectionsFileSchema = z.record(connectionEntrySchema);

type ConnectionsFile = z.infer<typeof connectionsFileSchema>;

export class FileConnectionStore implements ConnectionStore {
  constructor(private readonly path: string) {}

  async get(connId: string): Promise<Connection> {
    const entries = await this.load();
    const entry = entries[connId];
    if (!entry) {
      throw new ConnectionNotFoundError(connId);
    }

    const connection: Connection = { connId, host: entry.host };
    const token = entry.token ?? entry.extra?.token;
    if (token) {
      connection.token = token;
    }
    return connection;
  }

  private async load(): Promise<ConnectionsFile> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.debug({ path: this.path }, 'Connections file not found');
        return {};
      }
      throw error;
    }

    const result = connectionsFileSchema.safeParse(parse(content) ?? {});
    if (!result.success) {
      throw new TaskConfigurationError(
        `Invalid connections file ${this.path}: ${result.error.errors
          .map((e) => `${e.path.join('.')} ${e.message}`)
          .join('; ')}`
      );
    }
    return result.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
