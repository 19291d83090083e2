import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ChainedConnectionStore,
  EnvConnectionStore,
  FileConnectionStore,
  connectionEnvName,
  createConnectionStore,
  parseConnectionUri,
} from '../src/connections/index.js';
import { ConnectionNotFoundError, TaskConfigurationError } from '../src/errors.js';

describe('connectionEnvName', () => {
  it('should upper-case the id and replace separators', () => {
    expect(connectionEnvName('valohai_default')).toBe('VALOHAI_FLOW_CONN_VALOHAI_DEFAULT');
    expect(connectionEnvName('valohai-staging.eu')).toBe('VALOHAI_FLOW_CONN_VALOHAI_STAGING_EU');
  });
});

describe('parseConnectionUri', () => {
  it('should read the token from the password part', () => {
    expect(parseConnectionUri('c', 'valohai://:test-token@app.valohai.com')).toEqual({
      connId: 'c',
      host: 'app.valohai.com',
      token: 'test-token',
    });
  });

  it('should read the token from the query string', () => {
    expect(parseConnectionUri('c', 'valohai://app.valohai.com?token=test-token')).toEqual({
      connId: 'c',
      host: 'app.valohai.com',
      token: 'test-token',
    });
  });

  it('should accept a bare host without a token', () => {
    expect(parseConnectionUri('c', 'valohai.internal:8443')).toEqual({
      connId: 'c',
      host: 'valohai.internal:8443',
    });
  });

  it('should reject a URI without a host', () => {
    expect(() => parseConnectionUri('c', 'valohai://')).toThrow(TaskConfigurationError);
  });
});

describe('EnvConnectionStore', () => {
  it('should resolve a connection from its variable', async () => {
    const store = new EnvConnectionStore({
      VALOHAI_FLOW_CONN_VALOHAI_DEFAULT: 'valohai://:test-token@app.valohai.com',
    });

    await expect(store.get('valohai_default')).resolves.toEqual({
      connId: 'valohai_default',
      host: 'app.valohai.com',
      token: 'test-token',
    });
  });

  it('should raise ConnectionNotFoundError for a missing or empty variable', async () => {
    const store = new EnvConnectionStore({ VALOHAI_FLOW_CONN_EMPTY: '  ' });

    await expect(store.get('missing')).rejects.toThrow(ConnectionNotFoundError);
    await expect(store.get('empty')).rejects.toThrow(ConnectionNotFoundError);
  });
});

describe('FileConnectionStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'valohai-flow-connections-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read connections with a token or an extra token', async () => {
    const path = join(dir, 'connections.yaml');
    await writeFile(
      path,
      [
        'valohai_default:',
        '  host: app.valohai.com',
        '  token: test-token',
        'valohai_staging:',
        '  host: staging.valohai.com',
        '  extra:',
        '    token: staging-token',
        'valohai_anonymous:',
        '  host: valohai.internal',
        '',
      ].join('\n'),
      'utf-8'
    );
    const store = new FileConnectionStore(path);

    await expect(store.get('valohai_default')).resolves.toEqual({
      connId: 'valohai_default',
      host: 'app.valohai.com',
      token: 'test-token',
    });
    await expect(store.get('valohai_staging')).resolves.toEqual({
      connId: 'valohai_staging',
      host: 'staging.valohai.com',
      token: 'staging-token',
    });
    await expect(store.get('valohai_anonymous')).resolves.toEqual({
      connId: 'valohai_anonymous',
      host: 'valohai.internal',
    });
  });

  it('should raise ConnectionNotFoundError when the file does not exist', async () => {
    const store = new FileConnectionStore(join(dir, 'missing.yaml'));

    await expect(store.get('valohai_default')).rejects.toThrow(
      new ConnectionNotFoundError('valohai_default')
    );
  });

  it('should reject an entry without a host', async () => {
    const path = join(dir, 'connections.yaml');
    await writeFile(path, 'valohai_default:\n  token: test-token\n', 'utf-8');

    await expect(new FileConnectionStore(path).get('valohai_default')).rejects.toThrow(
      TaskConfigurationError
    );
  });
});

describe('ChainedConnectionStore', () => {
  it('should prefer earlier stores', async () => {
    const store = new ChainedConnectionStore([
      new EnvConnectionStore({ VALOHAI_FLOW_CONN_C: 'valohai://:env-token@env.valohai.com' }),
      new EnvConnectionStore({ VALOHAI_FLOW_CONN_C: 'valohai://:other-token@other.valohai.com' }),
    ]);

    await expect(store.get('c')).resolves.toMatchObject({ host: 'env.valohai.com' });
  });

  it('should fall through to later stores', async () => {
    const store = new ChainedConnectionStore([
      new EnvConnectionStore({}),
      new EnvConnectionStore({ VALOHAI_FLOW_CONN_C: 'later.valohai.com' }),
    ]);

    await expect(store.get('c')).resolves.toMatchObject({ host: 'later.valohai.com' });
  });

  it('should not swallow errors other than a missing connection', async () => {
    const store = new ChainedConnectionStore([
      new EnvConnectionStore({ VALOHAI_FLOW_CONN_C: 'valohai://' }),
      new EnvConnectionStore({ VALOHAI_FLOW_CONN_C: 'later.valohai.com' }),
    ]);

    await expect(store.get('c')).rejects.toThrow(TaskConfigurationError);
  });

  it('should raise ConnectionNotFoundError when no store knows the id', async () => {
    const store = createConnectionStore({ connectionsFile: join(tmpdir(), 'valohai-flow-none.yaml') }, {});

    await expect(store.get('valohai_default')).rejects.toThrow(ConnectionNotFoundError);
  });
});
