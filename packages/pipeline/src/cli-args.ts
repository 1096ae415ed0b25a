// Argument parsing for the insights CLI. Kept free of side effects so it can
// be exercised without spawning the process.

import type { PromptApproach } from '../types/report.js';
import type { CohortCriteria } from '../profile/cohort-selector.js';
import { MONTH_NAMES } from '../utils/calendar.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const APPROACHES: readonly PromptApproach[] = ['zero_shot', 'few_shot', 'chain_of_thought'];

function isApproach(value: string): value is PromptApproach {
  return APPROACHES.some(a => a === value);
}

export interface PeriodArgs {
  year: number;
  month: number;
}

export interface RunArgs extends PeriodArgs {
  userIds?: string[];
  criteria: Partial<CohortCriteria>;
  output?: string;
  concurrency?: number;
  approach?: PromptApproach;
  /** JSON file of transaction records; Postgres is used when absent */
  input?: string;
}

export interface ShowArgs extends PeriodArgs {
  userId: string;
  output?: string;
}

/** Accepts 1-12, or a month name / three-letter prefix in any case */
export function parseMonth(value: string): number {
  if (/^\d{1,2}$/.test(value)) {
    const n = Number(value);
    if (n >= 1 && n <= 12) return n;
  }
  const lower = value.toLowerCase();
  const index = MONTH_NAMES.findIndex(name =>
    name.toLowerCase() === lower || (lower.length >= 3 && name.toLowerCase().startsWith(lower)));
  if (index >= 0) return index + 1;
  throw new UsageError(`Invalid month "${value}". Use 1-12 or a month name.`);
}

export function parseYear(value: string): number {
  if (!/^\d{4}$/.test(value)) throw new UsageError(`Invalid year "${value}".`);
  return Number(value);
}

function parseNonNegative(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new UsageError(`${flag} expects a non-negative number, got "${value ?? ''}".`);
  }
  return n;
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} expects a value.`);
  }
  return value;
}

function splitPositional(args: string[], arity: number, usage: string): { positional: string[]; flags: string[] } {
  const positional: string[] = [];
  const flags: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      flags.push(arg);
      if (args[i + 1] !== undefined && !args[i + 1].startsWith('--')) flags.push(args[++i]);
    } else {
      positional.push(arg);
    }
  }
  if (positional.length !== arity) throw new UsageError(`Usage: ${usage}`);
  return { positional, flags };
}

export function parseRunArgs(args: string[], usage = 'insights run <year> <month> [options]'): RunArgs {
  const { positional, flags } = splitPositional(args, 2, usage);
  const parsed: RunArgs = {
    year: parseYear(positional[0]),
    month: parseMonth(positional[1]),
    criteria: {},
  };

  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    switch (flag) {
      case '--users': {
        const ids = takeValue(flags, i++, flag).split(',').map(s => s.trim()).filter(Boolean);
        if (ids.length === 0) throw new UsageError('--users expects a comma-separated list of user ids.');
        parsed.userIds = ids;
        break;
      }
      case '--min-transactions':
        parsed.criteria.minTransactions = parseNonNegative(flag, takeValue(flags, i++, flag));
        break;
      case '--min-spend':
        parsed.criteria.minSpend = parseNonNegative(flag, takeValue(flags, i++, flag));
        break;
      case '--min-cash-in':
        parsed.criteria.minCashIn = parseNonNegative(flag, takeValue(flags, i++, flag));
        break;
      case '--max-users':
        parsed.criteria.maxUsers = parseNonNegative(flag, takeValue(flags, i++, flag));
        break;
      case '--output':
        parsed.output = takeValue(flags, i++, flag);
        break;
      case '--input':
        parsed.input = takeValue(flags, i++, flag);
        break;
      case '--concurrency': {
        const n = parseNonNegative(flag, takeValue(flags, i++, flag));
        if (!Number.isInteger(n) || n < 1) throw new UsageError('--concurrency expects a positive integer.');
        parsed.concurrency = n;
        break;
      }
      case '--approach': {
        const value = takeValue(flags, i++, flag);
        if (!isApproach(value)) {
          throw new UsageError(`Invalid approach "${value}". Valid: ${APPROACHES.join(', ')}`);
        }
        parsed.approach = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option ${flag}.`);
    }
  }

  if (parsed.userIds && Object.keys(parsed.criteria).length > 0) {
    throw new UsageError('--users cannot be combined with cohort thresholds.');
  }
  return parsed;
}

export function parseShowArgs(args: string[]): ShowArgs {
  const usage = 'insights show <user> <year> <month> [--output <dir>]';
  const { positional, flags } = splitPositional(args, 3, usage);
  const parsed: ShowArgs = {
    userId: positional[0],
    year: parseYear(positional[1]),
    month: parseMonth(positional[2]),
  };
  for (let i = 0; i < flags.length; i++) {
    if (flags[i] === '--output') {
      parsed.output = takeValue(flags, i++, '--output');
    } else {
      throw new UsageError(`Unknown option ${flags[i]}.`);
    }
  }
  return parsed;
}
