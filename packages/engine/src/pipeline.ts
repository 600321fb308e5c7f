// Insight Engine — 5-stage request pipeline
//
// Question → Snapshot → Scope → Translate (plan) → Execute (scoped) → Compose
//
// Plan rejections end the request with a fixed "can't answer" reply; every
// other engine error is thrown to the caller surface.

import { randomUUID } from 'node:crypto';

import type { EngineConfig } from '../config/index.js';
import { createDocumentStore } from '../data/index.js';
import type { DocumentStore } from '../data/document-store.js';
import { TableCache, type TableSnapshot } from '../data/table-cache.js';
import { createScopeFilter, resolveScope, scopedRows } from '../scope/resolver.js';
import { executePlan, type ExecutionStats } from '../execution/executor.js';
import { IntentTranslator, type Translation } from '../planner/intent-translator.js';
import { AnthropicLlmService, type LlmService } from '../planner/llm-service.js';
import { describeSchema } from '../planner/prompts.js';
import { ResponseComposer } from '../composer/response-composer.js';
import { ForecastService } from '../insight/forecast.js';
import { buildDelayReport, type DelayReportOptions } from '../insight/delays.js';
import { detectRevenueAnomalies, type RevenueAnomalyOptions } from '../insight/revenue-anomalies.js';
import { lookupOrderStatus } from '../insight/order-status.js';
import { runAudit, type AuditOptions } from '../insight/audit.js';
import type { QueryResult } from '../types/plan.js';
import type { AccessScope, Role, ScopeFilter } from '../types/scope.js';
import type {
  AuditReport, DelayReport, ForecastRecord, OrderStatusView, RevenueAnomalyReport,
} from '../types/insight.js';
import {
  SimpleEventBus,
  type DomainEventType, type EventBus, type EventHandler,
} from '../types/events.js';
import {
  EngineError, ForbiddenOperation, UnsupportedPlan, isPlanRejection,
} from '../types/errors.js';
import { toDay } from '../utils/dates.js';
import { createLogger, errorMessage, setLogLevel } from '../utils/log.js';
import { throwIfAborted } from '../utils/retry.js';

const log = createLogger('Pipeline');

// ── Pipeline types ──────────────────────────────────────────────────

export type PipelineStage = 'snapshot' | 'scope' | 'translate' | 'execute' | 'compose';

export interface TraceEntry {
  stage: PipelineStage;
  outcome: 'ok' | 'rejected';
  ms: number;
  detail?: string;
}

export interface AskOptions {
  signal?: AbortSignal;
  /** Request day (YYYY-MM-DD); defaults to today in UTC */
  asOf?: string;
}

export interface AskResult {
  requestId: string;
  answer: string;
  structuredResult: QueryResult | null;
  forecastSnapshot?: ForecastRecord[];
  translation?: Translation;
  execution?: ExecutionStats;
  trace: TraceEntry[];
  timings: {
    snapshotMs: number;
    scopeMs: number;
    translateMs: number;
    executeMs: number;
    composeMs: number;
    totalMs: number;
  };
}

export interface InsightEngineDeps {
  config: EngineConfig;
  store: DocumentStore;
  llm: LlmService;
  events?: EventBus;
  now?: () => Date;
  onStatus?: (stage: string, message: string) => void;
}

interface ScopedContext {
  snapshot: TableSnapshot;
  scope: AccessScope;
  filter: ScopeFilter;
  asOf: string;
}

const STAGE_TIMING: Record<PipelineStage, Exclude<keyof AskResult['timings'], 'totalMs'>> = {
  snapshot: 'snapshotMs',
  scope: 'scopeMs',
  translate: 'translateMs',
  execute: 'executeMs',
  compose: 'composeMs',
};

const FORECAST_TOPIC = /\b(stock|stocks|inventory|forecast\w*|stock-?outs?|restock\w*|run(ning)? out)\b/i;

// ── Engine ──────────────────────────────────────────────────────────

export class InsightEngine {
  private readonly cache: TableCache;
  private readonly translator: IntentTranslator;
  private readonly composer: ResponseComposer;
  private readonly forecasts: ForecastService;
  private readonly events: EventBus;
  private readonly now: () => Date;

  constructor(private readonly deps: InsightEngineDeps) {
    const { config } = deps;
    this.events = deps.events ?? new SimpleEventBus();
    this.now = deps.now ?? (() => new Date());
    this.cache = new TableCache(deps.store, {
      refreshMs: config.cache.refreshMs,
      now: () => this.now().getTime(),
      onLoad: snapshot => this.emit('SnapshotLoaded', {
        version: snapshot.version,
        rows: {
          customers: snapshot.tables.customers.rows.length,
          orders: snapshot.tables.orders.rows.length,
          products: snapshot.tables.products.rows.length,
          revenue: snapshot.tables.revenue.rows.length,
        },
      }),
    });
    this.translator = new IntentTranslator(deps.llm, {
      replans: config.planner.replans,
      maxTokens: config.llm.maxTokens,
    });
    this.composer = new ResponseComposer(deps.llm, {
      maxRows: config.composer.maxRows,
      maxAnswerChars: config.composer.maxAnswerChars,
      maxTokens: config.llm.maxTokens,
    });
    this.forecasts = new ForecastService(config.forecast);
  }

  // ── Query pipeline ──────────────────────────────────────────────

  async ask(question: string, identity: string, role: Role, options: AskOptions = {}): Promise<AskResult> {
    const { signal } = options;
    const requestId = randomUUID();
    const totalStart = Date.now();
    const timings = { snapshotMs: 0, scopeMs: 0, translateMs: 0, executeMs: 0, composeMs: 0, totalMs: 0 };
    const trace: TraceEntry[] = [];
    const asOf = options.asOf ?? toDay(this.now());
    let stage: PipelineStage = 'snapshot';

    const finish = (entry: Omit<TraceEntry, 'ms'>, started: number) => {
      const ms = Date.now() - started;
      trace.push({ ...entry, ms });
      timings[STAGE_TIMING[entry.stage]] = ms;
    };

    this.emit('QuestionReceived', { role, length: question.length }, requestId);

    try {
      // ── Stage 1: Snapshot ───────────────────────────────────────
      this.status('snapshot', 'Loading data snapshot...');
      let started = Date.now();
      throwIfAborted(signal, stage);
      const snapshot = await this.cache.get(signal);
      finish({ stage, outcome: 'ok', detail: `version ${snapshot.version}` }, started);

      // ── Stage 2: Scope ──────────────────────────────────────────
      stage = 'scope';
      started = Date.now();
      throwIfAborted(signal, stage);
      const scope = resolveScope(identity, role, snapshot.tables);
      const filter = createScopeFilter(scope, snapshot.tables);
      finish({ stage, outcome: 'ok', detail: scope.role }, started);
      this.emit('ScopeResolved', { role: scope.role }, requestId);

      // ── Stage 3: Translate ──────────────────────────────────────
      stage = 'translate';
      this.status('translate', 'Planning query...');
      started = Date.now();
      throwIfAborted(signal, stage);
      let translation: Translation;
      try {
        if (!question.trim()) throw new UnsupportedPlan('Empty question');
        translation = await this.translator.translate(question.trim(), scope, {
          today: asOf,
          signal,
          onRejection: rejection => this.emit('PlanRejected', rejection, requestId),
        });
      } catch (err) {
        if (!isPlanRejection(err)) throw err;
        finish({ stage, outcome: 'rejected', detail: err.message }, started);
        timings.totalMs = Date.now() - totalStart;
        this.status('translate', 'No safe plan for this question');
        return { requestId, answer: err.userMessage, structuredResult: null, trace, timings };
      }
      finish({ stage, outcome: 'ok', detail: translation.origin }, started);
      this.emit('PlanAccepted', {
        origin: translation.origin,
        intent: translation.intent ?? null,
        source: translation.plan.source,
        attempts: translation.attempts,
      }, requestId);

      // ── Stage 4: Execute ────────────────────────────────────────
      stage = 'execute';
      this.status('execute', 'Running query...');
      started = Date.now();
      throwIfAborted(signal, stage);
      const execution = executePlan(translation.plan, snapshot.tables, filter);
      finish({ stage, outcome: 'ok', detail: `${execution.stats.outputRows} rows` }, started);
      this.emit('QueryExecuted', { ...execution.stats, empty: execution.result.empty }, requestId);

      const forecastSnapshot = scope.role === 'business' && FORECAST_TOPIC.test(question)
        ? this.forecastFor(snapshot, asOf, requestId)
        : undefined;

      // ── Stage 5: Compose ────────────────────────────────────────
      stage = 'compose';
      this.status('compose', 'Composing answer...');
      started = Date.now();
      throwIfAborted(signal, stage);
      const answer = await this.composer.compose(question, execution.result, signal);
      finish({ stage, outcome: 'ok' }, started);
      this.emit('AnswerComposed', { length: answer.length }, requestId);

      timings.totalMs = Date.now() - totalStart;
      return {
        requestId,
        answer,
        structuredResult: execution.result,
        ...(forecastSnapshot ? { forecastSnapshot } : {}),
        translation,
        execution: execution.stats,
        trace,
        timings,
      };
    } catch (err) {
      const code = err instanceof EngineError ? err.code : 'INTERNAL';
      this.emit('RequestFailed', { stage, code }, requestId);
      log.error('request failed', { requestId, stage, code, error: errorMessage(err) });
      throw err;
    }
  }

  // ── Insight operations ──────────────────────────────────────────

  /** Stock-out forecast for every product; business only */
  async getForecast(identity: string, role: Role, options: AskOptions = {}): Promise<ForecastRecord[]> {
    this.requireBusiness(role, 'getForecast');
    const { snapshot, asOf } = await this.context(identity, role, options);
    return this.forecastFor(snapshot, asOf);
  }

  /** Single order within the caller's scope; null when not visible */
  async orderStatus(orderId: string, identity: string, role: Role, options: AskOptions = {}): Promise<OrderStatusView | null> {
    const { snapshot, filter, asOf } = await this.context(identity, role, options);
    return lookupOrderStatus(orderId, snapshot.tables, filter, asOf);
  }

  /** Delay report over the caller's visible orders */
  async delayReport(
    identity: string,
    role: Role,
    options: AskOptions & DelayReportOptions = {},
  ): Promise<DelayReport> {
    const { snapshot, filter, asOf } = await this.context(identity, role, options);
    return buildDelayReport(scopedRows(snapshot.tables, 'orders', filter), asOf, options);
  }

  async revenueAnomalies(
    identity: string,
    role: Role,
    options: AskOptions & RevenueAnomalyOptions = {},
  ): Promise<RevenueAnomalyReport | null> {
    this.requireBusiness(role, 'revenueAnomalies');
    const { snapshot } = await this.context(identity, role, options);
    return detectRevenueAnomalies(snapshot.tables.revenue.rows, options);
  }

  async audit(identity: string, role: Role, options: AskOptions & AuditOptions = {}): Promise<AuditReport> {
    this.requireBusiness(role, 'audit');
    const { snapshot, asOf } = await this.context(identity, role, options);
    return runAudit(snapshot.tables, asOf, options);
  }

  /** Plan-grammar schema description visible to `role` */
  schema(role: Role): string {
    return describeSchema(role);
  }

  /** Drop cached tables and forecasts; the next request reloads */
  invalidate(): void {
    this.cache.invalidate();
    this.forecasts.clear();
  }

  onEvent(type: DomainEventType, handler: EventHandler): void {
    this.events.on(type, handler);
  }

  offEvent(type: DomainEventType, handler: EventHandler): void {
    this.events.off(type, handler);
  }

  // ── Internals ───────────────────────────────────────────────────

  private async context(identity: string, role: Role, options: AskOptions): Promise<ScopedContext> {
    throwIfAborted(options.signal, 'snapshot');
    const snapshot = await this.cache.get(options.signal);
    const scope = resolveScope(identity, role, snapshot.tables);
    return {
      snapshot,
      scope,
      filter: createScopeFilter(scope, snapshot.tables),
      asOf: options.asOf ?? toDay(this.now()),
    };
  }

  private forecastFor(snapshot: TableSnapshot, asOf: string, requestId?: string): ForecastRecord[] {
    const run = this.forecasts.get(snapshot, asOf);
    this.emit('ForecastComputed', {
      asOf,
      snapshotVersion: run.snapshotVersion,
      products: run.records.length,
      cached: run.cached,
    }, requestId);
    return run.records;
  }

  private requireBusiness(role: Role, operation: string): void {
    if (role !== 'business') throw new ForbiddenOperation(operation);
  }

  private emit(type: DomainEventType, payload: unknown, requestId?: string): void {
    this.events.emit({ eventId: randomUUID(), type, timestamp: new Date(), requestId, payload });
  }

  private status(stage: string, message: string): void {
    this.deps.onStatus?.(stage, message);
  }
}

// ── Factory ─────────────────────────────────────────────────────────

export function createInsightEngine(
  config: EngineConfig,
  overrides: Partial<Omit<InsightEngineDeps, 'config'>> = {},
): InsightEngine {
  setLogLevel(config.logLevel);
  return new InsightEngine({
    config,
    store: overrides.store ?? createDocumentStore(config.store),
    llm: overrides.llm ?? new AnthropicLlmService(config.llm),
    events: overrides.events,
    now: overrides.now,
    onStatus: overrides.onStatus,
  });
}
