import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.store).toEqual({ kind: 'file', dataFile: undefined, firestore: undefined });
    expect(config.planner.replans).toBe(1);
    expect(config.llm).toMatchObject({ retries: 1, timeoutMs: 20_000, maxTokens: 1024 });
    expect(config.forecast.windowDays).toBe(30);
    expect(config.forecast.horizonDays).toBe(30);
    expect(config.forecast.riskBands.map(b => b.below)).toEqual([7, 14, 30]);
    expect(config.forecast.isolation).toEqual({
      trees: 100, sampleSize: 256, threshold: 0.6, seed: 42, minSamples: 7,
    });
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides and treats empty strings as unset', () => {
    const config = loadConfig({
      INSIGHT_PLANNER_REPLANS: '3',
      INSIGHT_RISK_BANDS: '5,10,20',
      INSIGHT_COMPOSER_MAX_ROWS: '',
      INSIGHT_LOG_LEVEL: 'warn',
    });

    expect(config.planner.replans).toBe(3);
    expect(config.forecast.riskBands.map(b => b.below)).toEqual([5, 10, 20]);
    expect(config.composer.maxRows).toBe(50);
    expect(config.logLevel).toBe('warn');
  });

  it('requires Firestore credentials for the Firestore store', () => {
    expect(() => loadConfig({ INSIGHT_STORE: 'firestore' })).toThrow(ConfigError);

    const config = loadConfig({
      INSIGHT_STORE: 'firestore',
      FIRESTORE_PROJECT_ID: 'demo-project',
      FIRESTORE_ACCESS_TOKEN: 'test-token',
    });
    expect(config.store.firestore).toEqual({
      projectId: 'demo-project',
      accessToken: 'test-token',
      baseUrl: 'https://firestore.googleapis.com/v1',
      pageSize: 300,
      timeoutMs: 10_000,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ INSIGHT_LLM_RETRIES: 'many' })).toThrow(
      /^Invalid configuration INSIGHT_LLM_RETRIES/,
    );
    expect(() => loadConfig({ INSIGHT_ISOLATION_THRESHOLD: '0.4' })).toThrow(ConfigError);
    expect(() => loadConfig({ INSIGHT_STORE: 'postgres' })).toThrow(ConfigError);
  });
});
