import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { loadScriptConfig, parseScriptConfig, CONFIG_PATH_ENV } from './ScriptConfig.js';
import { ConfigValidationError } from '../errors/PlayPushError.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'playpush-config-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  delete process.env[CONFIG_PATH_ENV];
});

function writeConfig(content: string): string {
  const path = join(tmpDir, 'config.json');
  writeFileSync(path, content);
  return path;
}

describe('parseScriptConfig', () => {
  it('should accept accounts and default the scope prefix', () => {
    const config = parseScriptConfig({
      google_play_accounts: {
        release: { service_account: 'release_account', certificate: '/path/to/release.p12' },
      },
    });
    expect(config).toEqual({
      google_play_accounts: {
        release: { service_account: 'release_account', certificate: '/path/to/release.p12' },
      },
      taskcluster_scope_prefix: 'project:releng:googleplay:',
    });
  });

  it('should allow a config without accounts', () => {
    expect(parseScriptConfig({}).google_play_accounts).toBeUndefined();
  });

  it('should keep an explicit package name', () => {
    const config = parseScriptConfig({
      google_play_accounts: {
        dep: { service_account: 'dummy_dep', certificate: '/path/to/dummy', package_name: 'org.example.dep' },
      },
    });
    expect(config.google_play_accounts?.dep.package_name).toBe('org.example.dep');
  });

  it('should reject an account without a certificate', () => {
    expect(() =>
      parseScriptConfig({ google_play_accounts: { beta: { service_account: 'beta_account' } } }, 'config.json'),
    ).toThrow('Invalid script config in config.json: google_play_accounts.beta.certificate: Required');
  });

  it('should reject unknown account fields', () => {
    expect(() =>
      parseScriptConfig({
        google_play_accounts: { beta: { service_account: 'b', certificate: '/b.p12', password: 'test-secret' } },
      }),
    ).toThrow(ConfigValidationError);
  });
});

describe('loadScriptConfig', () => {
  it('should load a config file', async () => {
    const path = writeConfig(
      JSON.stringify({
        google_play_accounts: { aurora: { service_account: 'aurora_account', certificate: '/path/to/aurora.p12' } },
        taskcluster_scope_prefix: 'project:mobile:googleplay:',
      }),
    );
    const config = await loadScriptConfig(path);
    expect(config.taskcluster_scope_prefix).toBe('project:mobile:googleplay:');
    expect(config.google_play_accounts?.aurora.service_account).toBe('aurora_account');
  });

  it('should fall back to PLAYPUSH_CONFIG', async () => {
    process.env[CONFIG_PATH_ENV] = writeConfig('{}');
    const config = await loadScriptConfig();
    expect(config.taskcluster_scope_prefix).toBe('project:releng:googleplay:');
  });

  it('should fail without a path', async () => {
    await expect(loadScriptConfig()).rejects.toThrow('No config file given and PLAYPUSH_CONFIG is not set');
  });

  it('should fail on a missing file', async () => {
    await expect(loadScriptConfig(join(tmpDir, 'missing.json'))).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should fail on invalid JSON', async () => {
    const path = writeConfig('{ not json');
    await expect(loadScriptConfig(path)).rejects.toThrow(`Config file ${path} is not valid JSON`);
  });
});
