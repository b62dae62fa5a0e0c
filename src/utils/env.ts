import path from 'node:path';
import dotenv from 'dotenv';
import { ConfigError, isErrnoException } from '../errors.js';

const DEFAULT_ENV_PATH = path.resolve('.env');
let loadedEnvPath = DEFAULT_ENV_PATH;

function load(envPath: string) {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  loadedEnvPath = resolved;
  if (result.error && !(isErrnoException(result.error) && result.error.code === 'ENOENT')) {
    throw result.error;
  }
}

export function loadEnvironment(envPath?: string) {
  load(envPath ?? DEFAULT_ENV_PATH);
}

export function reloadEnvironment() {
  load(loadedEnvPath);
}

export interface AsrCredentials {
  appKey: string;
  accessKey: string;
}

/**
 * Reads the recognizer credentials from the environment. They are read per
 * session so a `.env` reload takes effect on the next recording.
 */
export function requireAsrCredentials(env: NodeJS.ProcessEnv = process.env): AsrCredentials {
  const appKey = env.ASR_APP_KEY?.trim();
  const accessKey = env.ASR_ACCESS_KEY?.trim();
  if (!appKey || !accessKey) {
    throw new ConfigError('Recognizer credentials are required. Set ASR_APP_KEY and ASR_ACCESS_KEY in .env');
  }
  return { appKey, accessKey };
}
