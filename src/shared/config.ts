import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getEventboardDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const RenderModeSchema = z.enum(['never', 'always', 'fallback']);
export type RenderMode = z.infer<typeof RenderModeSchema>;

/**
 * CSS selectors used to find listings on a page and the fields inside each
 * listing. `wrapper` is matched against the whole page, the others inside one
 * wrapper element.
 */
export const SiteProfileSchema = z.object({
  wrapper: z.string().default('[data-event], .event, article.event-card'),
  title: z.string().default('[data-event-title], .event-title, h2, h3'),
  link: z.string().default('a[href]'),
  date: z.string().default('time, [data-event-date], .event-date'),
  place: z.string().default('[data-event-place], .event-place, .event-location, .venue'),
  render: RenderModeSchema.default('fallback'),
});

export type SiteProfile = z.infer<typeof SiteProfileSchema>;

export const SiteProfileOverrideSchema = z.object({
  host: z.string().min(1),
  wrapper: z.string().optional(),
  title: z.string().optional(),
  link: z.string().optional(),
  date: z.string().optional(),
  place: z.string().optional(),
  render: RenderModeSchema.optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export type SiteProfileOverride = z.infer<typeof SiteProfileOverrideSchema>;

const SourceEntrySchema = z.object({
  url: z.string(),
  categories: z.string().default(''),
});

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export const ConfigSchema = z.object({
  sources_file: z.string().default('~/.eventboard/sources.csv'),
  sources: z.array(SourceEntrySchema).default([]),

  timezone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('Europe/Warsaw'),

  fetch: z
    .object({
      concurrency: z.number().int().positive().default(3),
      timeout_ms: z.number().int().positive().default(30000),
      render_settle_ms: z.number().int().nonnegative().default(2000),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
        ),
    })
    .default({}),

  extract: z
    .object({
      default_profile: SiteProfileSchema.default({}),
      profiles: z.array(SiteProfileOverrideSchema).default([]),
      default_place: z.string().default('No location'),
      llm_fallback: z.boolean().default(false),
      llm_excerpt_chars: z.number().int().positive().default(1500),
    })
    .default({}),

  aggregate: z
    .object({
      include_past: z.boolean().default(false),
    })
    .default({}),

  snapshot: z
    .object({
      path: z.string().default('~/.eventboard/events_data.json'),
      lock_path: z.string().default('~/.eventboard/run.lock'),
    })
    .default({}),

  server: z
    .object({
      port: z.number().int().positive().default(5000),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  schedule: z
    .object({
      run_cron: z.string().default('0 6 * * *'),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default('http://localhost:11434/v1'),
      api_key: z.string().default(''),
      model: z.string().default('tinydolphin'),
      max_tokens: z.number().default(500),
      temperature: z.number().default(0.1),
      timeout_ms: z.number().default(60000),
      max_concurrent: z.number().int().positive().default(1),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export interface LoadConfigOptions {
  force?: boolean;
  /** Explicit config file; wins over EVENTBOARD_CONFIG and discovery. */
  configPath?: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig && !options.force) return cachedConfig;

  const explorer = cosmiconfig('eventboard', {
    searchPlaces: [
      'eventboard.config.yaml',
      'eventboard.config.yml',
      '.eventboardrc.yaml',
      '.eventboardrc.yml',
    ],
  });

  const explicitPath = options.configPath ?? process.env['EVENTBOARD_CONFIG'];
  const defaultConfigPath = path.join(getEventboardDir(), 'config.yaml');

  let loaded: unknown = {};

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    loaded = (await explorer.load(resolved))?.config;
  } else {
    const found = await explorer.search();
    if (found) {
      logger.debug({ path: found.filepath }, 'Using discovered config');
      loaded = found.config;
    } else if (fs.existsSync(defaultConfigPath)) {
      loaded = (await explorer.load(defaultConfigPath))?.config;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const rawConfig: Record<string, unknown> = isRecord(loaded) ? { ...loaded } : {};
  applyEnvOverrides(rawConfig);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  const envApiKey = process.env['EVENTBOARD_LLM_API_KEY'];
  const envBaseUrl = process.env['EVENTBOARD_LLM_BASE_URL'];
  const envModel = process.env['EVENTBOARD_LLM_MODEL'];

  if (envApiKey || envBaseUrl || envModel) {
    const current = rawConfig['llm'];
    const llm: Record<string, unknown> = isRecord(current) ? { ...current } : {};
    if (envApiKey) llm['api_key'] = envApiKey;
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    rawConfig['llm'] = llm;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * Selector profile for a page: the default profile with the first override
 * whose `host` matches the page's hostname (or a parent domain of it) applied.
 */
export function resolveSiteProfile(
  extract: Config['extract'],
  url: string,
): SiteProfile & { timeout_ms?: number } {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return { ...extract.default_profile };
  }

  const override = extract.profiles.find((p) => {
    const host = p.host.toLowerCase().replace(/^www\./, '');
    return hostname === host || hostname.endsWith(`.${host}`);
  });
  if (!override) return { ...extract.default_profile };

  const base = extract.default_profile;
  return {
    wrapper: override.wrapper ?? base.wrapper,
    title: override.title ?? base.title,
    link: override.link ?? base.link,
    date: override.date ?? base.date,
    place: override.place ?? base.place,
    render: override.render ?? base.render,
    timeout_ms: override.timeout_ms,
  };
}
