// Command-line argument parsing for the `insight` CLI

import { isRole, type Role } from '../types/scope.js';
import { normalizeDay } from '../utils/dates.js';

export const COMMANDS = ['ask', 'forecast', 'delays', 'order', 'anomalies', 'audit', 'schema', 'help'] as const;

export type CommandName = typeof COMMANDS[number];

export interface CliOptions {
  role: Role;
  identity: string;
  asOf?: string;
  json: boolean;
  interactive: boolean;
  days?: number;
  threshold?: number;
  minDaysOverdue?: number;
  atRiskWindowDays?: number;
}

export type CliCommand =
  | { command: 'ask'; question: string; options: CliOptions }
  | { command: 'order'; orderId: string; options: CliOptions }
  | { command: 'forecast' | 'delays' | 'anomalies' | 'audit' | 'schema'; options: CliOptions }
  | { command: 'help'; topic?: CommandName };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Identity used for business-role commands when none is given */
export const DEFAULT_BUSINESS_IDENTITY = 'cli';

function isCommand(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

/** Longest revenue window, in days, the CLI accepts */
export const MAX_WINDOW_DAYS = 3650;

function numberArg(flag: string, value: string | undefined, integer: boolean, max = Infinity): number {
  if (value === undefined) throw new CliUsageError(`${flag} needs a value`);
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || (integer && !Number.isInteger(n))) {
    throw new CliUsageError(`${flag} must be a non-negative ${integer ? 'integer' : 'number'}, got "${value}"`);
  }
  if (n > max) throw new CliUsageError(`${flag} must be at most ${max}, got "${value}"`);
  return n;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv.length === 0) return { command: 'help' };
  const [first, ...rest] = argv;
  if (first === '--help' || first === '-h') return { command: 'help' };
  if (!isCommand(first)) throw new CliUsageError(`Unknown command: ${first}`);
  if (first === 'help') {
    const topic = rest[0];
    return topic !== undefined && isCommand(topic) ? { command: 'help', topic } : { command: 'help' };
  }

  let role: Role = 'business';
  let identity: string | undefined;
  const options: Omit<CliOptions, 'role' | 'identity'> = { json: false, interactive: false };
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { command: 'help', topic: first };
      case '--role': {
        const value = rest[++i];
        if (value === undefined || !isRole(value)) {
          throw new CliUsageError(`--role must be "customer" or "business"`);
        }
        role = value;
        break;
      }
      case '--as': {
        const value = rest[++i];
        if (!value) throw new CliUsageError('--as needs an identity');
        identity = value;
        break;
      }
      case '--as-of': {
        const value = rest[++i];
        const day = normalizeDay(value);
        if (day === null) throw new CliUsageError(`--as-of must be a date (YYYY-MM-DD), got "${value ?? ''}"`);
        options.asOf = day;
        break;
      }
      case '--json':
        options.json = true;
        break;
      case '-i':
      case '--interactive':
        options.interactive = true;
        break;
      case '--days':
        options.days = numberArg(arg, rest[++i], true, MAX_WINDOW_DAYS);
        break;
      case '--threshold':
        options.threshold = numberArg(arg, rest[++i], false);
        break;
      case '--min-overdue':
        options.minDaysOverdue = numberArg(arg, rest[++i], true);
        break;
      case '--window':
        options.atRiskWindowDays = numberArg(arg, rest[++i], true);
        break;
      default:
        if (arg.startsWith('--')) throw new CliUsageError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  if (role === 'customer' && identity === undefined) {
    throw new CliUsageError('--role customer needs --as <customer id>');
  }
  const resolved: CliOptions = { ...options, role, identity: identity ?? DEFAULT_BUSINESS_IDENTITY };

  switch (first) {
    case 'ask': {
      const question = positional.join(' ').trim();
      if (!question && !resolved.interactive) throw new CliUsageError('No question provided');
      return { command: 'ask', question, options: resolved };
    }
    case 'order': {
      const orderId = positional[0];
      if (!orderId) throw new CliUsageError('No order id provided');
      return { command: 'order', orderId, options: resolved };
    }
    default:
      return { command: first, options: resolved };
  }
}
