/**
 * Connections given as environment variables holding URIs:
 *
 *   VALOHAI_FLOW_CONN_VALOHAI_DEFAULT=valohai://:<token>@app.valohai.com
 *
 * The token may also be passed as a `token` query parameter. A bare host with
 * no scheme is accepted for anonymous connections.
 */

import { ConnectionNotFoundError, TaskConfigurationError } from '../errors.js';
import type { Connection, ConnectionStore } from './types.js';

export const CONNECTION_ENV_PREFIX = 'VALOHAI_FLOW_CONN_';

export function connectionEnvName(connId: string): string {
  return `${CONNECTION_ENV_PREFIX}${connId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

export function parseConnectionUri(connId: string, value: string): Connection {
  const uri = value.includes('://') ? value : `valohai://${value}`;

  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new TaskConfigurationError(`Invalid URI for connection ${connId}`);
  }

  if (!url.host) {
    throw new TaskConfigurationError(`Connection ${connId} has no host`);
  }

  const connection: Connection = { connId, host: url.host };
  const token =
    url.searchParams.get('token') ?? (url.password ? decodeURIComponent(url.password) : undefined);
  if (token) {
    connection.token = token;
  }
  return connection;
}

export class EnvConnectionStore implements ConnectionStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(connId: string): Promise<Connection> {
    const value = this.env[connectionEnvName(connId)];
    if (value === undefined || value.trim() === '') {
      throw new ConnectionNotFoundError(connId);
    }
    return parseConnectionUri(connId, value.trim());
  }
}
