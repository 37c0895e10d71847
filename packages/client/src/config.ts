import { readFileSync } from 'fs';
import dotenv from 'dotenv';
import { FireApiError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.24fire.de/kvm';
export const DEFAULT_TIMEOUT_MS = 5000;

/** Immutable per-client settings. */
export interface ClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  /** Applies to the whole request, connect through body. */
  readonly timeoutMs: number;
}

export interface ClientConfigInput {
  /** Surrounding whitespace is trimmed; the trimmed key is what X-FIRE-APIKEY carries. */
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/** Apply defaults and validate. Throws FireApiError on bad input. */
export function resolveConfig(input: ClientConfigInput): ClientConfig {
  const apiKey = typeof input.apiKey === 'string' ? input.apiKey.trim() : '';
  if (!apiKey) {
    throw new FireApiError('API key is required');
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new FireApiError(`Invalid timeout: ${timeoutMs}`);
  }

  const baseUrl = input.baseUrl?.trim() || DEFAULT_BASE_URL;
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (err) {
    throw new FireApiError(`Invalid base URL: ${baseUrl}`, { cause: err });
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new FireApiError(`Invalid base URL: ${baseUrl}`);
  }

  return Object.freeze({ apiKey, baseUrl, timeoutMs });
}

export interface LoadConfigOptions {
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Optional .env file; variables already present in `env` win. */
  envFile?: string;
}

/**
 * Build a config from FIRE_API_KEY, FIRE_API_BASE_URL and FIRE_API_TIMEOUT_MS.
 */
export function loadConfigFromEnv(options: LoadConfigOptions = {}): ClientConfig {
  const fileVars = options.envFile ? dotenv.parse(readFileSync(options.envFile)) : {};
  const env: NodeJS.ProcessEnv = { ...fileVars, ...(options.env ?? process.env) };

  const rawTimeout = env.FIRE_API_TIMEOUT_MS?.trim();
  return resolveConfig({
    apiKey: env.FIRE_API_KEY ?? '',
    baseUrl: env.FIRE_API_BASE_URL,
    timeoutMs: rawTimeout ? Number(rawTimeout) : undefined,
  });
}
