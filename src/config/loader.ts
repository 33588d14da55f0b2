import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { InvalidConfigError } from '../errors/config.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge<T extends object>(base: T, override: DeepPartial<T>): T {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result as T;
}

function loadFileConfig(cwd: string): DeepPartial<AppConfig> {
  const candidates = [join(cwd, '.sift.json'), join(cwd, 'sift.config.json')];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = readFileSync(candidate, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new InvalidConfigError(`Could not parse ${candidate}`, err);
    }
    if (!isPlainObject(parsed)) {
      throw new InvalidConfigError(`${candidate} must contain a JSON object`);
    }
    return parsed as DeepPartial<AppConfig>;
  }
  return {};
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port)) {
    throw new InvalidConfigError(`SIFT_API_PORT must be an integer, got "${raw}"`);
  }
  return port;
}

function loadEnvOverrides(env: NodeJS.ProcessEnv): DeepPartial<AppConfig> {
  const overrides: DeepPartial<AppConfig> = {};

  const indexRoot = env['SIFT_INDEX_ROOT'];
  if (indexRoot) overrides.indexRoot = indexRoot;

  const dirsFile = env['SIFT_DIRS_FILE'];
  if (dirsFile) overrides.dirsFile = dirsFile;

  const logLevel = env['SIFT_LOG_LEVEL'];
  if (logLevel) overrides.logLevel = logLevel as AppConfig['logLevel'];

  const embedder = env['SIFT_EMBEDDER'];
  if (embedder) overrides.embedder = embedder as AppConfig['embedder'];

  const ollamaBaseUrl = env['OLLAMA_BASE_URL'];
  if (ollamaBaseUrl) overrides.ollamaBaseUrl = ollamaBaseUrl;

  const ollamaEmbedModel = env['OLLAMA_EMBED_MODEL'];
  if (ollamaEmbedModel) overrides.ollamaEmbedModel = ollamaEmbedModel;

  const port = env['SIFT_API_PORT'];
  const host = env['SIFT_API_HOST'];
  if (port ?? host) {
    overrides.api = {
      ...(port ? { port: parsePort(port) } : {}),
      ...(host ? { host } : {}),
    };
  }

  return overrides;
}

export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides(env);

  let config = deepMerge(DEFAULT_CONFIG, fileConfig);
  config = deepMerge(config, envOverrides);

  return config;
}
