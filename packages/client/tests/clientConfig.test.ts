import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  clearConfigCache,
  loadClientConfig,
  parseClientConfig,
  versionCapsOf,
} from '../src/index.js';

describe('parseClientConfig', () => {
  it('should apply defaults', () => {
    const config = parseClientConfig({ server: { url: 'ws://localhost:4100' } });

    expect(config).toEqual({
      server: { url: 'ws://localhost:4100' },
      logging: { level: 'info' },
      globals: {},
    });
  });

  it('should accept version caps', () => {
    const config = parseClientConfig({
      server: { url: 'ws://localhost:4100' },
      logging: { level: 'debug' },
      globals: { wl_seat: { maxVersion: 5 }, wl_output: { maxVersion: 2 } },
    });

    expect(versionCapsOf(config)).toEqual({ wl_seat: 5, wl_output: 2 });
  });

  it('should reject a missing server url', () => {
    expect(() => parseClientConfig({})).toThrow(ConfigError);
    expect(() => parseClientConfig({ server: {} })).toThrow(
      'Invalid client configuration: server.url: Required'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() =>
      parseClientConfig({ server: { url: 'ws://localhost:4100' }, logging: { level: 'loud' } })
    ).toThrow(ConfigError);
  });

  it('should reject a non-positive version cap', () => {
    expect(() =>
      parseClientConfig({
        server: { url: 'ws://localhost:4100' },
        globals: { wl_seat: { maxVersion: 0 } },
      })
    ).toThrow(ConfigError);
  });
});

describe('loadClientConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'global-env-config-'));
    clearConfigCache();
  });

  afterEach(() => {
    clearConfigCache();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: string): string {
    const path = join(dir, name);
    writeFileSync(path, contents, 'utf8');
    return path;
  }

  it('should load and validate a YAML file', () => {
    const path = writeConfig(
      'client.yaml',
      ['server:', '  url: ws://localhost:4100', 'globals:', '  wl_seat:', '    maxVersion: 5', ''].join(
        '\n'
      )
    );

    const config = loadClientConfig(path);

    expect(config.server.url).toBe('ws://localhost:4100');
    expect(config.logging.level).toBe('info');
    expect(config.globals).toEqual({ wl_seat: { maxVersion: 5 } });
  });

  it('should cache the first load', () => {
    const first = writeConfig('first.yaml', 'server:\n  url: ws://first:1\n');
    const second = writeConfig('second.yaml', 'server:\n  url: ws://second:2\n');

    loadClientConfig(first);

    expect(loadClientConfig(second).server.url).toBe('ws://first:1');
  });

  it('should reload after the cache is cleared', () => {
    const first = writeConfig('first.yaml', 'server:\n  url: ws://first:1\n');
    const second = writeConfig('second.yaml', 'server:\n  url: ws://second:2\n');

    loadClientConfig(first);
    clearConfigCache();

    expect(loadClientConfig(second).server.url).toBe('ws://second:2');
  });

  it('should reject an invalid file', () => {
    const path = writeConfig('bad.yaml', 'server:\n  url: 42\n');

    expect(() => loadClientConfig(path)).toThrow(ConfigError);
  });
});
