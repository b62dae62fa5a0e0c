import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_ASR_URL, DEFAULT_PORT, loadConfig, parseConfig, reloadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  let tempDir: string | null = null;

  beforeEach(() => {
    reloadConfig();
    vi.stubEnv('ASR_DAEMON_PORT', '');
    vi.stubEnv('ASR_DAEMON_HOST', '');
    vi.stubEnv('ASR_URL', '');
    vi.stubEnv('ASR_RESOURCE_ID', '');
  });

  afterEach(async () => {
    reloadConfig();
    vi.unstubAllEnvs();
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('falls back to defaults when config.json is missing', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'asr-config-'));

    const config = await loadConfig(path.join(tempDir, 'config.json'));

    expect(config.server).toEqual({ host: '127.0.0.1', port: DEFAULT_PORT });
    expect(config.asr.url).toBe(DEFAULT_ASR_URL);
    expect(config.audio).toEqual({ sampleRate: 16000, segmentDurationMs: 200 });
    expect(config.session.finishTimeoutMs).toBe(1500);
    expect(config.control).toEqual({ stopWaitMs: 5000, cancelWaitMs: 2000 });
  });

  it('merges a partial file over the defaults and caches until reload', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'asr-config-'));
    const configPath = path.join(tempDir, 'config.json');
    await writeFile(configPath, JSON.stringify({ server: { port: 19000 }, asr: { enablePunc: false } }), 'utf-8');

    const first = await loadConfig(configPath);
    expect(first.server.port).toBe(19000);
    expect(first.asr.enablePunc).toBe(false);
    expect(first.asr.enableItn).toBe(true);

    await writeFile(configPath, JSON.stringify({ server: { port: 19001 } }), 'utf-8');
    expect((await loadConfig(configPath)).server.port).toBe(19000);

    reloadConfig();
    expect((await loadConfig(configPath)).server.port).toBe(19001);
  });

  it('rejects malformed JSON', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'asr-config-'));
    const configPath = path.join(tempDir, 'config.json');
    await writeFile(configPath, '{ not json', 'utf-8');

    await expect(loadConfig(configPath)).rejects.toThrow(SyntaxError);
  });
});

describe('parseConfig', () => {
  it('lets ASR_DAEMON_PORT and friends override the file', () => {
    const config = parseConfig(
      { server: { port: 19000 } },
      { ASR_DAEMON_PORT: '18999', ASR_DAEMON_HOST: '0.0.0.0', ASR_URL: 'ws://127.0.0.1:9/asr', ASR_RESOURCE_ID: 'test-resource' }
    );

    expect(config.server).toEqual({ host: '0.0.0.0', port: 18999 });
    expect(config.asr.url).toBe('ws://127.0.0.1:9/asr');
    expect(config.asr.resourceId).toBe('test-resource');
  });

  it('rejects a non-numeric port override', () => {
    expect(() => parseConfig({}, { ASR_DAEMON_PORT: 'abc' })).toThrow(
      new ConfigError('ASR_DAEMON_PORT must be a port number, got "abc"')
    );
  });

  it('rejects audio settings whose segment is not whole 16-bit samples', () => {
    expect(() => parseConfig({ audio: { sampleRate: 22050, segmentDurationMs: 30 } }, {})).toThrow(
      new ConfigError('invalid config: audio.segmentDurationMs: segment of 1323 bytes is not a whole number of 16-bit samples')
    );
    expect(parseConfig({ audio: { sampleRate: 22050, segmentDurationMs: 20 } }, {}).audio.segmentDurationMs).toBe(20);
  });

  it('reports the path of every invalid field', () => {
    expect(() => parseConfig({ server: { port: 70000 }, audio: { sampleRate: 'fast' } }, {})).toThrow(
      /invalid config: server\.port: .*; audio\.sampleRate: /
    );
  });
});
