#!/usr/bin/env node
// Transaction insights — CLI
//
// Usage:
//   insights run 2025 4                          # every active user in April 2025
//   insights run 2025 April --users u1,u2        # explicit users
//   insights run 2025 4 --min-spend 100          # cohort thresholds
//   insights cohort 2025 4                       # list the active cohort
//   insights show u1 2025 4                      # print a stored report
//   insights migrate                             # apply SQL migrations
//   insights --help                              # usage

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { loadConfig, type InsightsConfig } from '../config/index.js';
import { PgClient } from '../db/pg-client.js';
import { InMemoryTransactionStore, type TransactionStore } from '../store/transaction-store.js';
import { PgTransactionStore } from '../store/pg-transaction-store.js';
import { CohortSelector } from '../profile/cohort-selector.js';
import { AnthropicTextGenerator } from '../bridge/anthropic-generator.js';
import { HttpTextClassifier } from '../bridge/http-classifier.js';
import { readReport } from '../report/report-reader.js';
import { ConfigError, InsightsError } from '../types/errors.js';
import { monthName } from '../utils/calendar.js';
import { ReportPipeline, type RunProgress } from './pipeline.js';
import { UsageError, parseRunArgs, parseShowArgs, type RunArgs } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class InsightsCli {
  private pg: PgClient | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h' || rawArgs[0] === 'help') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);
    if (rest.includes('--help') || rest.includes('-h')) {
      this.printHelp();
      return;
    }

    try {
      switch (command) {
        case 'run':
          await this.handleRun(rest);
          break;
        case 'cohort':
          await this.handleCohort(rest);
          break;
        case 'show':
          await this.handleShow(rest);
          break;
        case 'migrate':
          await this.handleMigrate();
          break;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          process.exitCode = 1;
      }
    } finally {
      if (this.pg) await this.pg.close();
    }
  }

  // ── Subcommand: run ─────────────────────────────────────────────

  private async handleRun(args: string[]): Promise<void> {
    const parsed = parseRunArgs(args);
    const config = this.withOverrides(loadConfig(), parsed);

    if (!config.llm.apiKey) {
      throw new ConfigError('ANTHROPIC_API_KEY environment variable is required.', ['ANTHROPIC_API_KEY: Required']);
    }

    const controller = new AbortController();
    const onSigint = (): void => {
      process.stderr.write(`\n  ${c('yellow', 'Cancelling…')} in-flight users stop at their next retry boundary\n`);
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    const pipeline = new ReportPipeline({
      store: await this.openStore(config, parsed.input),
      generator: new AnthropicTextGenerator(config.llm),
      classifier: new HttpTextClassifier(config.classifier),
      config,
    });

    const period = `${monthName(parsed.month)} ${parsed.year}`;
    console.log(`\n  ${c('bold', 'Generating reports')} ${c('dim', `for ${period} → ${config.output.root}`)}\n`);

    try {
      const result = await pipeline.run(
        parsed.year,
        parsed.month,
        parsed.userIds ? { userIds: parsed.userIds } : { criteria: parsed.criteria },
        { concurrency: parsed.concurrency, signal: controller.signal, onProgress: p => this.printProgress(p) },
      );

      console.log(
        `\n  ${c('bold', 'Done:')} ${c('green', `${result.saved} saved`)}, ` +
        `${c('yellow', `${result.flagged} flagged`)}, ${c('red', `${result.failed} failed`)} ` +
        c('dim', `(${(result.totalDurationMs / 1000).toFixed(1)}s)`),
      );
      for (const o of result.outcomes.filter(o => o.status === 'failed')) {
        console.log(`    ${c('red', '✗')} ${o.userId} ${c('dim', `[${o.errorCode ?? 'UNEXPECTED'}]`)} ${o.error ?? ''}`);
      }
      console.log();

      if (result.failed > 0) process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }

  private printProgress(p: RunProgress): void {
    if (p.status === 'running') return;
    const mark = p.status === 'saved' ? c('green', '✓') : p.status === 'flagged' ? c('yellow', '!') : c('red', '✗');
    const detail = p.status === 'failed' ? c('dim', ` ${p.error ?? ''}`) : p.status === 'flagged' ? c('yellow', ' flagged for review') : '';
    console.log(`    ${mark} ${c('dim', `[${p.completed}/${p.total}]`)} ${p.current}${detail}`);
  }

  // ── Subcommand: cohort ──────────────────────────────────────────

  private async handleCohort(args: string[]): Promise<void> {
    const parsed = parseRunArgs(args, 'insights cohort <year> <month> [options]');
    const config = loadConfig();
    const selector = new CohortSelector(await this.openStore(config, parsed.input));
    const users = await selector.selectActive(parsed.year, parsed.month, { ...config.cohort, ...parsed.criteria });

    console.log(`\n  ${c('bold', `${users.length} active users`)} ${c('dim', `in ${monthName(parsed.month)} ${parsed.year}`)}\n`);
    for (const userId of users) console.log(`    ${c('cyan', userId)}`);
    console.log();
  }

  // ── Subcommand: show ────────────────────────────────────────────

  private async handleShow(args: string[]): Promise<void> {
    const parsed = parseShowArgs(args);
    const root = parsed.output ?? loadConfig().output.root;
    const report = await readReport(root, parsed.userId, parsed.year, parsed.month);

    if (!report) {
      console.error(`  ${c('yellow', 'Not generated:')} no report for ${parsed.userId} in ${monthName(parsed.month)} ${parsed.year}\n`);
      process.exitCode = 1;
      return;
    }

    const flagColor = report.ethicalFlag === 'Safe' ? 'green' : 'yellow';
    console.log(`\n  ${c('bold', `Report for ${report.userId}`)} ${c('dim', `${report.monthName} ${report.year}`)} ` +
      `${c(flagColor, report.ethicalFlag)} ${c('dim', `(confidence ${report.confidence.toFixed(2)})`)}\n`);
    for (const [name, text] of Object.entries(report.sections)) {
      console.log(`  ${c('cyan', name)}`);
      console.log(`    ${text.split('\n').join('\n    ')}\n`);
    }
  }

  // ── Subcommand: migrate ─────────────────────────────────────────

  private async handleMigrate(): Promise<void> {
    const pg = this.pgClient(loadConfig());
    const ran = await pg.runMigrations();
    console.log(ran.length > 0
      ? `\n  ${c('green', 'Applied:')} ${ran.join(', ')}\n`
      : `\n  ${c('dim', 'Schema is up to date.')}\n`);
  }

  // ── Helpers ─────────────────────────────────────────────────────

  private withOverrides(config: InsightsConfig, args: RunArgs): InsightsConfig {
    return {
      ...config,
      generation: { ...config.generation, approach: args.approach ?? config.generation.approach },
      output: {
        root: args.output ?? config.output.root,
        concurrency: args.concurrency ?? config.output.concurrency,
      },
    };
  }

  private pgClient(config: InsightsConfig): PgClient {
    if (!this.pg) this.pg = new PgClient(config.database);
    return this.pg;
  }

  private async openStore(config: InsightsConfig, input?: string): Promise<TransactionStore> {
    if (!input) return new PgTransactionStore(this.pgClient(config));

    const raw: unknown = JSON.parse(await readFile(input, 'utf-8'));
    if (!Array.isArray(raw)) {
      throw new UsageError(`${input} must contain a JSON array of transaction records.`);
    }
    return new InMemoryTransactionStore(raw);
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Transaction Insights')} — monthly narrative reports from transaction data

  ${c('bold', 'Usage:')}
    insights run <year> <month> [options]      Generate reports for a period
    insights cohort <year> <month> [options]   List the active cohort for a period
    insights show <user> <year> <month>        Print a stored report
    insights migrate                           Apply database migrations
    insights --help                            Show this help

  ${c('bold', 'Options:')}
    --users <a,b,...>             Explicit users instead of the active cohort
    --min-transactions <n>        Cohort threshold (default: COHORT_MIN_TRANSACTIONS)
    --min-spend <amount>          Cohort threshold
    --min-cash-in <amount>        Cohort threshold
    --max-users <n>               Cohort size cap
    --input <file.json>           Read transactions from a JSON file instead of Postgres
    --output <dir>                Report root (default: REPORTS_DIR or ./reports)
    --concurrency <n>             Users processed at once
    --approach <name>             zero_shot, few_shot or chain_of_thought

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required for run.
    CLASSIFIER_URL                Required for run. Text classification endpoint.
    PG_HOST, PG_DATABASE, ...     Transaction store connection.

  ${c('bold', 'Examples:')}
    insights run 2025 4
    insights run 2025 April --users u-1001,u-1002 --approach few_shot
    insights show u-1001 2025 4
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new InsightsCli();
cli.start().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
  } else if (err instanceof ConfigError) {
    console.error(`  ${c('red', 'Configuration error:')} ${err.message}\n`);
  } else if (err instanceof InsightsError) {
    console.error(`  ${c('red', `${err.code}:`)} ${err.message}\n`);
  } else {
    console.error(`${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
