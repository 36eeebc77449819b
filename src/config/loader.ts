import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError } from '../errors.js';
import { AppConfigSchema, type AppConfig, type LastFmConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const PASSWORD_MASK = '********';

type RawSection = Record<string, unknown>;

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(env.CONFIG_PATH || DEFAULT_CONFIG_PATH);
}

/**
 * Load and validate the config file. A missing file means "all defaults";
 * environment variables win over file values.
 */
export async function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  let raw: RawSection = {};
  if (existsSync(path)) {
    const content = await readFile(path, 'utf-8');
    try {
      raw = toSection(JSON.parse(content));
    } catch (err) {
      throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
    }
  }
  return parseConfig(applyEnvOverrides(raw, env), path);
}

export function parseConfig(raw: unknown, source = 'config'): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

export function applyEnvOverrides(raw: RawSection, env: NodeJS.ProcessEnv): RawSection {
  const out: RawSection = { ...raw };
  const section = (name: string): RawSection => {
    const merged = toSection(out[name]);
    out[name] = merged;
    return merged;
  };

  if (env.PORT) section('server').port = Number(env.PORT);
  if (env.AUTH_TOKEN) section('server').authToken = env.AUTH_TOKEN;
  if (env.AUDD_API_TOKEN) section('recognition').apiToken = env.AUDD_API_TOKEN;
  if (env.VERBOSE === '1' || env.VERBOSE === 'true') section('logging').verbose = true;

  const lastfmEnv: Array<[keyof LastFmConfig, string | undefined]> = [
    ['apiKey', env.LASTFM_API_KEY],
    ['apiSecret', env.LASTFM_API_SECRET],
    ['username', env.LASTFM_USERNAME],
    ['password', env.LASTFM_PASSWORD],
  ];
  if (lastfmEnv.some(([, value]) => value)) {
    const lastfm = section('lastfm');
    for (const [key, value] of lastfmEnv) {
      if (value) lastfm[key] = value;
    }
  }

  return out;
}

export async function saveConfig(path: string, config: AppConfig): Promise<void> {
  await writeFile(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/** Last.fm settings safe to hand to a browser. */
export function maskLastFm(lastfm: LastFmConfig | undefined): LastFmConfig {
  return {
    apiKey: lastfm?.apiKey ?? '',
    apiSecret: lastfm?.apiSecret ?? '',
    username: lastfm?.username ?? '',
    password: lastfm?.password ? PASSWORD_MASK : '',
  };
}

function toSection(value: unknown): RawSection {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}
