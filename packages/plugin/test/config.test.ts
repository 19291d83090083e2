/**
 * Configuration Module Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, getConfig, resetConfig } from '../src/config/index.js';

describe('Configuration Module', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should return correct defaults when no env vars set', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        pollIntervalMs: 30000,
        requestTimeoutMs: 30000,
        pageLimit: 10000,
        connectionsFile: '.valohai-flow/connections.yaml',
        dataDir: '.valohai-flow/data',
        defaultConnId: 'valohai_default',
      });
      expect(config.pollTimeoutMs).toBeUndefined();
    });

    it('should parse numeric variables', () => {
      const config = loadConfig({
        VALOHAI_FLOW_POLL_INTERVAL_MS: '5000',
        VALOHAI_FLOW_POLL_TIMEOUT_MS: '3600000',
        VALOHAI_FLOW_REQUEST_TIMEOUT_MS: '10000',
        VALOHAI_FLOW_PAGE_LIMIT: '500',
      });

      expect(config.pollIntervalMs).toBe(5000);
      expect(config.pollTimeoutMs).toBe(3600000);
      expect(config.requestTimeoutMs).toBe(10000);
      expect(config.pageLimit).toBe(500);
    });

    it('should parse path and connection variables', () => {
      const config = loadConfig({
        VALOHAI_FLOW_CONNECTIONS_FILE: '/etc/valohai-flow/connections.yaml',
        VALOHAI_FLOW_DATA_DIR: '/var/lib/valohai-flow',
        VALOHAI_FLOW_DEFAULT_CONN_ID: 'valohai_prod',
      });

      expect(config.connectionsFile).toBe('/etc/valohai-flow/connections.yaml');
      expect(config.dataDir).toBe('/var/lib/valohai-flow');
      expect(config.defaultConnId).toBe('valohai_prod');
    });

    it('should treat empty values as unset', () => {
      const config = loadConfig({ VALOHAI_FLOW_POLL_INTERVAL_MS: '', VALOHAI_FLOW_DATA_DIR: ' ' });

      expect(config.pollIntervalMs).toBe(30000);
      expect(config.dataDir).toBe('.valohai-flow/data');
    });

    it('should allow a zero poll interval', () => {
      expect(loadConfig({ VALOHAI_FLOW_POLL_INTERVAL_MS: '0' }).pollIntervalMs).toBe(0);
    });

    it('should name the fields that fail validation', () => {
      expect(() =>
        loadConfig({ VALOHAI_FLOW_PAGE_LIMIT: '20000', VALOHAI_FLOW_REQUEST_TIMEOUT_MS: 'soon' })
      ).toThrow('Configuration validation failed for: requestTimeoutMs, pageLimit');
    });

    it('should reject a poll timeout under one second', () => {
      expect(() => loadConfig({ VALOHAI_FLOW_POLL_TIMEOUT_MS: '10' })).toThrow('pollTimeoutMs');
    });
  });

  describe('getConfig', () => {
    it('should read process.env once and cache the result', () => {
      vi.stubEnv('VALOHAI_FLOW_PAGE_LIMIT', '250');
      const first = getConfig();
      vi.stubEnv('VALOHAI_FLOW_PAGE_LIMIT', '300');

      expect(getConfig()).toBe(first);
      expect(first.pageLimit).toBe(250);
    });

    it('should reload after resetConfig', () => {
      vi.stubEnv('VALOHAI_FLOW_PAGE_LIMIT', '250');
      getConfig();
      resetConfig();
      vi.stubEnv('VALOHAI_FLOW_PAGE_LIMIT', '300');

      expect(getConfig().pageLimit).toBe(300);
    });
  });
});
