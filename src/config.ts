import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, isErrnoException } from './errors.js';
import { segmentSizeBytes } from './protocol/segmenter.js';

export const DEFAULT_PORT = 18888;
export const DEFAULT_ASR_URL = 'wss://openspeech.bytedance.com/api/v3/sauc/bigmodel_async';
export const DEFAULT_RESOURCE_ID = 'volc.seedasr.sauc.duration';

const serverSchema = z
  .object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  })
  .default({});

const asrSchema = z
  .object({
    url: z.string().url().default(DEFAULT_ASR_URL),
    resourceId: z.string().min(1).default(DEFAULT_RESOURCE_ID),
    uid: z.string().min(1).default('dictation_daemon_user'),
    modelName: z.string().min(1).default('bigmodel'),
    enableItn: z.boolean().default(true),
    enablePunc: z.boolean().default(true),
    enableDdc: z.boolean().default(true),
    showUtterances: z.boolean().default(true),
    // Two-pass recognition: realtime results first, then a high-accuracy revision.
    enableNonstream: z.boolean().default(true),
    endWindowSizeMs: z.number().int().min(200).max(10_000).default(3000),
  })
  .default({});

const audioSchema = z
  .object({
    sampleRate: z.number().int().min(8_000).max(48_000).default(16_000),
    segmentDurationMs: z.number().int().min(20).max(1000).default(200),
    captureDevice: z.string().min(1).optional(),
  })
  .default({});

const sessionSchema = z
  .object({
    finishTimeoutMs: z.number().int().min(0).default(1500),
    forceCloseGraceMs: z.number().int().min(0).default(300),
    cancelTimeoutMs: z.number().int().min(0).default(500),
    audioPollMs: z.number().int().min(1).max(1000).default(100),
    receivePollMs: z.number().int().min(1).max(5000).default(300),
    sendTimeoutMs: z.number().int().min(1).default(2000),
    handshakeTimeoutMs: z.number().int().min(1).default(3000),
  })
  .default({});

const controlSchema = z
  .object({
    stopWaitMs: z.number().int().min(0).default(5000),
    cancelWaitMs: z.number().int().min(0).default(2000),
  })
  .default({});

export const configSchema = z
  .object({
    server: serverSchema,
    asr: asrSchema,
    audio: audioSchema,
    session: sessionSchema,
    control: controlSchema,
  })
  .superRefine((config, ctx) => {
    const size = segmentSizeBytes(config.audio.sampleRate, config.audio.segmentDurationMs);
    if (size <= 0 || size % 2 !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['audio', 'segmentDurationMs'],
        message: `segment of ${size} bytes is not a whole number of 16-bit samples`,
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;
export type AudioConfig = AppConfig['audio'];
export type SessionTimingConfig = AppConfig['session'];
export type ControlConfig = AppConfig['control'];

let cachedConfig: AppConfig | null = null;

async function readConfigFile(configPath: string): Promise<unknown> {
  try {
    const raw = await readFile(configPath, 'utf-8');
    return JSON.parse(raw);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigError(`ASR_DAEMON_PORT must be a port number, got "${raw}"`);
  }
  return port;
}

/**
 * Environment variables win over config.json. ASR_DAEMON_PORT is the only
 * name read for the control-plane port.
 */
export function applyEnvironmentOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const server = { ...config.server };
  const asr = { ...config.asr };
  if (env.ASR_DAEMON_PORT) {
    server.port = parsePort(env.ASR_DAEMON_PORT);
  }
  if (env.ASR_DAEMON_HOST) {
    server.host = env.ASR_DAEMON_HOST;
  }
  if (env.ASR_URL) {
    asr.url = env.ASR_URL;
  }
  if (env.ASR_RESOURCE_ID) {
    asr.resourceId = env.ASR_RESOURCE_ID;
  }
  return { ...config, server, asr };
}

export function parseConfig(input: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid config: ${detail}`);
  }
  return applyEnvironmentOverrides(result.data, env);
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = parseConfig(await readConfigFile(configPath));
  cachedConfig = parsed;
  return parsed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
