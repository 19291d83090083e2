/**
 * A named platform host and credential pair, as held by the orchestrator
 */
export interface Connection {
  connId: string;
  host: string;
  token?: string;
}

export interface ConnectionStore {
  /**
   * Resolve a connection, rejecting with `ConnectionNotFoundError` when the
   * store does not know `connId`
   */
  get(connId: string): Promise<Connection>;
}

export const DEFAULT_CONN_ID = 'valohai_default';
