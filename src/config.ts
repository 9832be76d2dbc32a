import 'dotenv/config';
import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

const selector = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const selectorMapSchema = z.object({
  listing: selector,
  name: selector,
  website: selector.optional(),
  email: selector.optional(),
  phone: selector.optional(),
  address: selector.optional(),
  city: selector.optional(),
  state: selector.optional(),
  zip_code: selector.optional(),
  specialty: selector.optional(),
  detail_link: selector.optional(),
  next_page: selector.optional(),
});

export const sourceConfigSchema = z
  .object({
    base_url: z.string().url(),
    search_url_template: z.string().includes('{query}').optional(),
    list_url: z.string().url().optional(),
    rate_limit: z.number().nonnegative().optional(),
    jitter: z.number().nonnegative().optional(),
    requires_js: z.boolean().optional(),
    wait_for: z.string().optional(),
    wait_timeout_ms: z.number().int().positive().optional(),
    output_file: z.string().optional(),
    email_from_website: z.boolean().optional(),
    selectors: selectorMapSchema,
  })
  .strict();

export const sourcesFileSchema = z.record(z.string().min(1), sourceConfigSchema);

export type Selector = z.infer<typeof selector>;
export type SelectorMap = Readonly<z.infer<typeof selectorMapSchema>>;
export type SourceConfig = Readonly<z.infer<typeof sourceConfigSchema>>;
export type SourceMap = ReadonlyMap<string, SourceConfig>;

export interface Settings {
  outputFile: string;
  logLevel: string;
  defaultRateLimit: number;
  defaultMaxResults?: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  sourcesConfig: string;
  chromePath?: string;
  browserWsEndpoint?: string;
  proxy?: string;
}

export const DEFAULT_QUERY = 'interior designer';

/** First entry of a selector, used where a single CSS string is needed. */
export function primarySelector(sel: Selector): string {
  return Array.isArray(sel) ? sel[0] : sel;
}

export function selectorList(sel: Selector | undefined): string[] {
  if (!sel) return [];
  return Array.isArray(sel) ? sel : [sel];
}

export function parseSources(raw: unknown): SourceMap {
  const parsed = sourcesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid source configuration:\n  ${issues.join('\n  ')}`);
  }
  return new Map(Object.entries(parsed.data).map(([name, cfg]) => [name, Object.freeze(cfg)]));
}

export function loadSources(filePath: string): SourceMap {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Cannot read source configuration ${filePath}: ${describeError(e)}`, { cause: e });
  }
  return parseSources(raw);
}

function numberFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value === '') return fallback;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new ConfigError(`${key} must be a non-negative number, got "${value}"`);
  return n;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const maxResults = env.DEFAULT_MAX_RESULTS ? numberFromEnv(env, 'DEFAULT_MAX_RESULTS', 0) : undefined;
  return {
    outputFile: env.OUTPUT_FILE || 'output/designers.csv',
    logLevel: env.LOG_LEVEL || 'info',
    defaultRateLimit: numberFromEnv(env, 'DEFAULT_RATE_LIMIT', 1.0),
    defaultMaxResults: maxResults && maxResults > 0 ? maxResults : undefined,
    requestTimeoutMs: numberFromEnv(env, 'REQUEST_TIMEOUT_MS', 20000),
    maxRetries: Math.max(1, numberFromEnv(env, 'MAX_RETRIES', 3)),
    retryBaseDelayMs: numberFromEnv(env, 'RETRY_BASE_DELAY_MS', 1000),
    sourcesConfig: env.SOURCES_CONFIG || 'config/sources.json',
    chromePath: env.CHROME_PATH || undefined,
    browserWsEndpoint: env.BROWSER_WS_ENDPOINT || undefined,
    proxy: env.HTTPS_PROXY || env.HTTP_PROXY || undefined,
  };
}
