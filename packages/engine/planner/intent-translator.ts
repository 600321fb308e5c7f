// Intent Translator — question + role → validated QueryPlan
// The model proposes; the validator decides. A rejected plan gets a bounded
// number of re-plans with the rejection reason, then a canned fallback.

import type { QueryPlan } from '../types/plan.js';
import type { AccessScope } from '../types/scope.js';
import {
  PlannerUnavailable, RequestCancelled, UnsupportedPlan, isPlanRejection,
  type EngineErrorCode, type PlanRejectionKind,
} from '../types/errors.js';
import { checkRolePermissions, parsePlan, validatePlan } from '../execution/validate.js';
import { createLogger } from '../utils/log.js';
import { throwIfAborted } from '../utils/retry.js';
import { matchCannedIntent } from './canned-plans.js';
import { extractJsonObject } from './extract-json.js';
import type { LlmService } from './llm-service.js';
import { plannerSystemPrompt, plannerUserPrompt } from './prompts.js';
import { resolveRelativeDates } from './relative-dates.js';

const log = createLogger('IntentTranslator');

export interface PlanRejectionRecord {
  attempt: number;
  code: EngineErrorCode;
  kind: PlanRejectionKind | null;
  message: string;
}

export interface Translation {
  plan: QueryPlan;
  origin: 'model' | 'canned';
  /** Canned intent name when origin is 'canned' */
  intent?: string;
  /** Model calls made */
  attempts: number;
  rejections: PlanRejectionRecord[];
}

export interface TranslateOptions {
  /** Request day (YYYY-MM-DD) for relative dates */
  today: string;
  signal?: AbortSignal;
  onRejection?: (rejection: PlanRejectionRecord) => void;
}

export interface IntentTranslatorOptions {
  replans: number;
  maxTokens?: number;
}

export class IntentTranslator {
  constructor(
    private readonly llm: LlmService,
    private readonly options: IntentTranslatorOptions,
  ) {}

  async translate(question: string, scope: AccessScope, opts: TranslateOptions): Promise<Translation> {
    const { today, signal } = opts;
    const rejections: PlanRejectionRecord[] = [];
    const system = plannerSystemPrompt(scope.role, today);
    let lastRejection: Error | null = null;
    let feedback: string | null = null;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.options.replans + 1; attempt++) {
      throwIfAborted(signal, 'translate');
      const text = await this.callPlanner(system, plannerUserPrompt(question, feedback), signal);
      attempts++;

      try {
        const plan = this.acceptPlan(extractJsonObject(text), scope, today);
        log.debug('plan accepted', { attempt, source: plan.source });
        return { plan, origin: 'model', attempts, rejections };
      } catch (err) {
        if (!isPlanRejection(err)) throw err;
        const record: PlanRejectionRecord = {
          attempt,
          code: err.code,
          kind: err instanceof UnsupportedPlan ? err.kind : null,
          message: err.message,
        };
        rejections.push(record);
        opts.onRejection?.(record);
        log.info('plan rejected', { attempt, code: record.code, kind: record.kind, reason: record.message });
        lastRejection = err;
        feedback = err.message;
      }
    }

    const intent = matchCannedIntent(question, scope.role);
    if (intent) {
      const plan = this.acceptPlan(intent.plan(today), scope, today);
      log.info('using canned plan', { intent: intent.name });
      return { plan, origin: 'canned', intent: intent.name, attempts, rejections };
    }

    throw lastRejection ?? new UnsupportedPlan('No plan could be produced');
  }

  private acceptPlan(candidate: unknown, scope: AccessScope, today: string): QueryPlan {
    if (candidate === undefined) {
      throw new UnsupportedPlan('Planner output did not contain a JSON object', 'grammar');
    }
    const plan = resolveRelativeDates(parsePlan(candidate), today);
    checkRolePermissions(plan, scope.role);
    validatePlan(plan);
    return plan;
  }

  private async callPlanner(system: string, prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.llm.complete({ system, prompt, maxTokens: this.options.maxTokens }, signal);
    } catch (err) {
      if (err instanceof RequestCancelled) throw err;
      throw new PlannerUnavailable(err);
    }
  }
}
