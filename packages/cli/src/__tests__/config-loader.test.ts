import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '@labfleet/shared';
import { loadConfig } from '../config-loader.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'labfleet-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function configFile(content: unknown): Promise<string> {
  const path = join(dir, 'labfleet.json');
  await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

describe('loadConfig', () => {
  it('reads sections from the file and fills defaults', async () => {
    const path = await configFile({
      manifest: { path: 'fleet.yaml' },
      execution: { parallelism: 3 },
      collaborators: { provision: ['/usr/local/bin/provision'] },
    });
    const config = loadConfig(path, {});
    expect(config.manifest.path).toBe('fleet.yaml');
    expect(config.execution).toEqual({
      parallelism: 3,
      retryAttempts: 3,
      retryDelayMs: 10_000,
      maxRetryDelayMs: 120_000,
      backoff: 'fixed',
    });
    expect(config.state).toEqual({ path: '.labfleet/state.json', healthDbPath: '.labfleet/health.db' });
    expect(config.collaborators).toEqual({
      provision: ['/usr/local/bin/provision'],
      fatalExitCodes: [65, 77],
      timeoutMs: 600_000,
    });
  });

  it('lets environment variables override the file', async () => {
    const path = await configFile({ execution: { parallelism: 3 } });
    const config = loadConfig(path, {
      LABFLEET_MANIFEST: 'other.json',
      LABFLEET_STATE: '/var/lib/labfleet/state.json',
      LABFLEET_PARALLELISM: '6',
      LABFLEET_RETRY_DELAY_MS: '0',
      LABFLEET_CONFIGURE_COMMAND: '  ansible-apply  --check ',
    });
    expect(config.manifest.path).toBe('other.json');
    expect(config.state.path).toBe('/var/lib/labfleet/state.json');
    expect(config.execution.parallelism).toBe(6);
    expect(config.execution.retryDelayMs).toBe(0);
    expect(config.collaborators.configure).toEqual(['ansible-apply', '--check']);
  });

  it('rejects a non-integer environment value', async () => {
    const path = await configFile({});
    expect(() => loadConfig(path, { LABFLEET_PARALLELISM: 'many' })).toThrow(
      'LABFLEET_PARALLELISM must be an integer, got "many"'
    );
  });

  it('reports schema violations with their path', async () => {
    const path = await configFile({ execution: { parallelism: 0 } });
    expect(() => loadConfig(path, {})).toThrow(
      'Invalid configuration: execution.parallelism: Number must be greater than or equal to 1'
    );
  });

  it('fails on a missing explicit file', () => {
    const path = join(dir, 'absent.json');
    expect(() => loadConfig(path, {})).toThrow(`Config file not found: ${path}`);
  });

  it('fails on a file that is not a JSON object', async () => {
    const path = await configFile('[1, 2]');
    expect(() => loadConfig(path, {})).toThrow(ConfigError);
    expect(() => loadConfig(path, {})).toThrow(`Config file ${path} must contain a JSON object`);
  });
});
