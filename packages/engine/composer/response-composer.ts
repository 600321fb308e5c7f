// Response Composer — turns a scoped result into a natural-language answer
// The model only ever sees the question and the already-scoped result.

import type { QueryResult } from '../types/plan.js';
import { ComposerUnavailable, RequestCancelled } from '../types/errors.js';
import type { LlmService } from '../planner/llm-service.js';
import { COMPOSER_SYSTEM_PROMPT, composerUserPrompt } from '../planner/prompts.js';
import { throwIfAborted } from '../utils/retry.js';
import { formatResult } from './format-result.js';

export const NO_DATA_ANSWER = 'No data available for this request.';

export interface ResponseComposerOptions {
  maxRows: number;
  maxAnswerChars: number;
  maxTokens?: number;
}

// C0 controls except tab and newline, plus DEL
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

/** Model text is untrusted: strip control characters and cap the length */
export function sanitizeAnswer(text: string, maxChars: number): string {
  const clean = text.replace(/\r\n?/g, '\n').replace(CONTROL_CHARS, '').trim();
  if (clean.length <= maxChars) return clean;
  return `${clean.slice(0, maxChars - 1).trimEnd()}…`;
}

export class ResponseComposer {
  constructor(
    private readonly llm: LlmService,
    private readonly options: ResponseComposerOptions,
  ) {}

  async compose(question: string, result: QueryResult, signal?: AbortSignal): Promise<string> {
    if (result.empty) return NO_DATA_ANSWER;
    throwIfAborted(signal, 'compose');

    let raw: string;
    try {
      raw = await this.llm.complete({
        system: COMPOSER_SYSTEM_PROMPT,
        prompt: composerUserPrompt(question, formatResult(result, this.options.maxRows)),
        maxTokens: this.options.maxTokens,
      }, signal);
    } catch (err) {
      if (err instanceof RequestCancelled) throw err;
      throw new ComposerUnavailable(err);
    }

    const answer = sanitizeAnswer(raw, this.options.maxAnswerChars);
    if (!answer) throw new ComposerUnavailable(new Error('Model returned an empty answer'));
    return answer;
  }
}
