import { ConnectionNotFoundError } from '../errors.js';
import type { Connection, ConnectionStore } from './types.js';

/**
 * Tries each store in order; the first that knows the connection wins
 */
export class ChainedConnectionStore implements ConnectionStore {
  constructor(private readonly stores: ConnectionStore[]) {}

  async get(connId: string): Promise<Connection> {
    for (const store of this.stores) {
      try {
        return await store.get(connId);
      } catch (error) {
        if (!(error instanceof ConnectionNotFoundError)) {
          throw error;
        }
      }
    }
    throw new ConnectionNotFoundError(connId);
  }
}
