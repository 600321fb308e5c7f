// Engine configuration — parsed from environment variables
// Policy knobs (risk bands, retries, forecast window) are tunable here rather
// than hard-coded in the modules that apply them.

import { z } from 'zod';
import type { LogLevel } from '../utils/log.js';

export type StoreKind = 'firestore' | 'file';

export interface LlmConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  maxTokens: number;
}

export interface RiskBand {
  level: 'Critical' | 'High' | 'Moderate';
  /** Exclusive upper bound on projected days to stock-out */
  below: number;
}

export interface ForecastConfig {
  windowDays: number;
  horizonDays: number;
  riskBands: RiskBand[];
  isolation: {
    trees: number;
    sampleSize: number;
    threshold: number;
    seed: number;
    minSamples: number;
  };
}

export interface StoreConfig {
  kind: StoreKind;
  dataFile?: string;
  firestore?: {
    projectId: string;
    accessToken: string;
    baseUrl: string;
    pageSize: number;
    timeoutMs: number;
  };
}

export interface EngineConfig {
  llm: LlmConfig;
  planner: { replans: number };
  composer: { maxRows: number; maxAnswerChars: number };
  cache: { refreshMs: number };
  forecast: ForecastConfig;
  store: StoreConfig;
  logLevel: LogLevel;
}

const intFrom = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  INSIGHT_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  INSIGHT_LLM_TIMEOUT_MS: intFrom(20_000, 1),
  INSIGHT_LLM_RETRIES: intFrom(1),
  INSIGHT_LLM_BACKOFF_MS: intFrom(500),
  INSIGHT_LLM_MAX_TOKENS: intFrom(1024, 64),
  INSIGHT_PLANNER_REPLANS: intFrom(1),
  INSIGHT_COMPOSER_MAX_ROWS: intFrom(50, 1),
  INSIGHT_COMPOSER_MAX_CHARS: intFrom(4000, 100),
  INSIGHT_CACHE_REFRESH_MS: intFrom(300_000, 0),
  INSIGHT_FORECAST_WINDOW_DAYS: intFrom(30, 1),
  INSIGHT_FORECAST_HORIZON_DAYS: intFrom(30, 1),
  INSIGHT_RISK_BANDS: z.string().default('7,14,30'),
  INSIGHT_ISOLATION_TREES: intFrom(100, 1),
  INSIGHT_ISOLATION_SAMPLE: intFrom(256, 2),
  INSIGHT_ISOLATION_THRESHOLD: z.coerce.number().gt(0.5).lt(1).default(0.6),
  INSIGHT_ISOLATION_SEED: intFrom(42),
  INSIGHT_ISOLATION_MIN_SAMPLES: intFrom(7, 2),
  INSIGHT_STORE: z.enum(['firestore', 'file']).default('file'),
  INSIGHT_DATA_FILE: z.string().optional(),
  FIRESTORE_PROJECT_ID: z.string().optional(),
  FIRESTORE_ACCESS_TOKEN: z.string().optional(),
  FIRESTORE_BASE_URL: z.string().url().default('https://firestore.googleapis.com/v1'),
  FIRESTORE_PAGE_SIZE: intFrom(300, 1),
  FIRESTORE_TIMEOUT_MS: intFrom(10_000, 1),
  INSIGHT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse comma-separated ascending cutoffs into Critical/High/Moderate bands.
 * Cutoffs must be strictly increasing so every finite value maps to one band.
 */
export function parseRiskBands(value: string): RiskBand[] {
  const cutoffs = value.split(',').map(s => Number(s.trim()));
  if (cutoffs.length !== 3 || cutoffs.some(c => !Number.isFinite(c) || c <= 0)) {
    throw new ConfigError(`INSIGHT_RISK_BANDS must be three positive numbers, got "${value}"`);
  }
  if (!(cutoffs[0] < cutoffs[1] && cutoffs[1] < cutoffs[2])) {
    throw new ConfigError(`INSIGHT_RISK_BANDS must be strictly increasing, got "${value}"`);
  }
  return [
    { level: 'Critical', below: cutoffs[0] },
    { level: 'High', below: cutoffs[1] },
    { level: 'Moderate', below: cutoffs[2] },
  ];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  // Empty strings from .env files mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  let firestore: StoreConfig['firestore'];
  if (e.INSIGHT_STORE === 'firestore') {
    if (!e.FIRESTORE_PROJECT_ID || !e.FIRESTORE_ACCESS_TOKEN) {
      throw new ConfigError('FIRESTORE_PROJECT_ID and FIRESTORE_ACCESS_TOKEN are required when INSIGHT_STORE=firestore');
    }
    firestore = {
      projectId: e.FIRESTORE_PROJECT_ID,
      accessToken: e.FIRESTORE_ACCESS_TOKEN,
      baseUrl: e.FIRESTORE_BASE_URL,
      pageSize: e.FIRESTORE_PAGE_SIZE,
      timeoutMs: e.FIRESTORE_TIMEOUT_MS,
    };
  }

  return {
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.INSIGHT_MODEL,
      timeoutMs: e.INSIGHT_LLM_TIMEOUT_MS,
      retries: e.INSIGHT_LLM_RETRIES,
      backoffMs: e.INSIGHT_LLM_BACKOFF_MS,
      maxTokens: e.INSIGHT_LLM_MAX_TOKENS,
    },
    planner: { replans: e.INSIGHT_PLANNER_REPLANS },
    composer: { maxRows: e.INSIGHT_COMPOSER_MAX_ROWS, maxAnswerChars: e.INSIGHT_COMPOSER_MAX_CHARS },
    cache: { refreshMs: e.INSIGHT_CACHE_REFRESH_MS },
    forecast: {
      windowDays: e.INSIGHT_FORECAST_WINDOW_DAYS,
      horizonDays: e.INSIGHT_FORECAST_HORIZON_DAYS,
      riskBands: parseRiskBands(e.INSIGHT_RISK_BANDS),
      isolation: {
        trees: e.INSIGHT_ISOLATION_TREES,
        sampleSize: e.INSIGHT_ISOLATION_SAMPLE,
        threshold: e.INSIGHT_ISOLATION_THRESHOLD,
        seed: e.INSIGHT_ISOLATION_SEED,
        minSamples: e.INSIGHT_ISOLATION_MIN_SAMPLES,
      },
    },
    store: {
      kind: e.INSIGHT_STORE,
      dataFile: e.INSIGHT_DATA_FILE,
      firestore,
    },
    logLevel: e.INSIGHT_LOG_LEVEL,
  };
}

export const DEFAULT_FORECAST_CONFIG: ForecastConfig = loadConfig({}).forecast;
