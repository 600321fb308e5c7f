#!/usr/bin/env node
// Insight Desk — command-line interface
//
// Usage:
//   insight ask "Which orders are delayed?"                       # business scope
//   insight ask --role customer --as CUST_001 "Show my orders"     # customer scope
//   insight ask -i                                                 # interactive REPL
//   insight forecast                                               # stock-out risk
//   insight delays | order <id> | anomalies | audit | schema
//   insight --help

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { ConfigError, loadConfig } from '../config/index.js';
import { formatResult } from '../composer/format-result.js';
import { EngineError } from '../types/errors.js';
import type {
  AuditReport, DelayRecord, DelayReport, ForecastRecord, OrderStatusView, RevenueAnomalyReport,
} from '../types/insight.js';
import { formatMoney } from '../utils/money.js';
import {
  CliUsageError, parseCliArgs,
  type CliCommand, type CliOptions, type CommandName,
} from './args.js';
import { createInsightEngine, type AskResult, type InsightEngine } from './pipeline.js';

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
  gray: isTTY ? '\x1b[90m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const RISK_COLOR: Record<ForecastRecord['riskLevel'], keyof typeof ansi> = {
  Critical: 'red',
  High: 'yellow',
  Moderate: 'cyan',
  Low: 'green',
};

// ── CLI class ───────────────────────────────────────────────────────

class InsightCli {
  private engine: InsightEngine | null = null;

  async start(): Promise<void> {
    let parsed: CliCommand;
    try {
      parsed = parseCliArgs(process.argv.slice(2));
    } catch (err) {
      if (!(err instanceof CliUsageError)) throw err;
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      process.exitCode = 1;
      return;
    }

    switch (parsed.command) {
      case 'help':
        this.printHelp(parsed.topic);
        return;
      case 'schema':
        console.log(this.getEngine().schema(parsed.options.role));
        return;
      case 'ask':
        if (!process.env.ANTHROPIC_API_KEY) {
          console.error(`  ${c('red', 'Error:')} ANTHROPIC_API_KEY environment variable is required.\n`);
          process.exitCode = 1;
          return;
        }
        if (parsed.options.interactive) {
          await this.startRepl(parsed.options);
        } else {
          // Ctrl-C abandons the request between stages
          const controller = new AbortController();
          process.once('SIGINT', () => controller.abort());
          await this.runAsk(parsed.question, parsed.options, controller.signal);
        }
        return;
      case 'forecast':
        await this.runForecast(parsed.options);
        return;
      case 'delays':
        await this.runDelays(parsed.options);
        return;
      case 'order':
        await this.runOrder(parsed.orderId, parsed.options);
        return;
      case 'anomalies':
        await this.runAnomalies(parsed.options);
        return;
      case 'audit':
        await this.runAudit(parsed.options);
        return;
    }
  }

  private getEngine(): InsightEngine {
    this.engine ??= createInsightEngine(loadConfig(process.env), {
      onStatus: (stage, message) => {
        if (isTTY) process.stderr.write(`  ${c('gray', `[${stage}]`)} ${c('dim', message)}          \r`);
      },
    });
    return this.engine;
  }

  // ── Subcommand: ask ─────────────────────────────────────────────

  private async runAsk(question: string, options: CliOptions, signal?: AbortSignal): Promise<void> {
    const result = await this.getEngine().ask(question, options.identity, options.role, { asOf: options.asOf, signal });
    if (isTTY) process.stderr.write(' '.repeat(60) + '\r');
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    this.printAnswer(result);
  }

  private printAnswer(result: AskResult): void {
    console.log(`\n${result.answer}\n`);
    if (result.structuredResult && !result.structuredResult.empty) {
      console.log(c('dim', formatResult(result.structuredResult, 20)));
      console.log();
    }
    if (result.forecastSnapshot) {
      this.printForecast(result.forecastSnapshot.filter(r => r.riskLevel !== 'Low'));
    }
    const origin = result.translation
      ? result.translation.origin === 'canned' ? `canned plan (${result.translation.intent ?? 'unknown'})` : 'model plan'
      : 'no plan';
    console.log(c('gray', `  ${origin} · ${result.timings.totalMs}ms · ${result.requestId}`));
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(options: CliOptions): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    const who = options.role === 'customer' ? options.identity : 'business';
    console.log(`\n  ${c('bold', 'Insight Desk')} ${c('gray', `(${who})`)} — type a question, or "exit"\n`);

    rl.setPrompt(c('cyan', '> '));
    rl.prompt();
    for await (const line of rl) {
      const question = line.trim();
      if (question === 'exit' || question === 'quit') break;
      if (question) {
        try {
          await this.runAsk(question, options);
        } catch (err) {
          this.printError(err);
        }
      }
      rl.prompt();
    }
    rl.close();
  }

  // ── Insight subcommands ─────────────────────────────────────────

  private async runForecast(options: CliOptions): Promise<void> {
    const records = await this.getEngine().getForecast(options.identity, options.role, { asOf: options.asOf });
    if (options.json) {
      console.log(JSON.stringify(records.map(({ series: _series, ...rest }) => rest), null, 2));
      return;
    }
    this.printForecast(records);
  }

  private printForecast(records: ForecastRecord[]): void {
    if (records.length === 0) {
      console.log(`  ${c('green', 'No products at risk of stock-out.')}\n`);
      return;
    }
    console.log(`  ${c('bold', 'Stock-out forecast')}`);
    for (const r of records) {
      const days = r.projectedDaysToStockout === null ? '—' : `${r.projectedDaysToStockout.toFixed(1)}d`;
      const flag = r.anomalyFlag ? c('yellow', ` (spikes excluded: ${r.anomalousDays.join(', ')})`) : '';
      console.log(
        `  ${c(RISK_COLOR[r.riskLevel], r.riskLevel.padEnd(8))} ${r.productId.padEnd(10)} ${r.productName.padEnd(24)}`
        + ` stock ${String(r.stockLevel).padStart(5)}  burn ${r.burnRate.toFixed(2).padStart(6)}/day  ${days}${flag}`,
      );
    }
    console.log();
  }

  private async runDelays(options: CliOptions): Promise<void> {
    const report = await this.getEngine().delayReport(options.identity, options.role, {
      asOf: options.asOf,
      minDaysOverdue: options.minDaysOverdue,
      atRiskWindowDays: options.atRiskWindowDays,
    });
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    this.printDelays(report);
  }

  private printDelays(report: DelayReport): void {
    const headline = report.overdue.length > 0
      ? c('red', `${report.overdue.length} orders overdue`)
      : report.atRisk.length > 0
        ? c('yellow', `${report.atRisk.length} orders at risk of delay`)
        : c('green', 'All pending orders are on track');
    console.log(`\n  ${c('bold', `Delivery status as of ${report.asOf}:`)} ${headline}`);
    console.log(c('gray', `  ${report.totalPending} pending · ${report.onTrackCount} on track\n`));

    const line = (r: DelayRecord) =>
      `  ${r.orderId.padEnd(12)} ${r.status.padEnd(10)} due ${r.estimatedDelivery}  ${r.shippingMethod ?? ''}`;
    for (const r of report.overdue) console.log(`${line(r)}  ${c('red', `${-r.slackDays}d late`)}`);
    for (const r of report.atRisk) console.log(`${line(r)}  ${c('yellow', `${r.slackDays}d left`)}`);

    const methods = Object.entries(report.shippingMethodIssues);
    if (methods.length > 0) {
      console.log(`\n  ${c('bold', 'Overdue by shipping method:')} ${methods.map(([m, n]) => `${m} ${n}`).join(', ')}`);
    }
    console.log();
  }

  private async runOrder(orderId: string, options: CliOptions): Promise<void> {
    const view = await this.getEngine().orderStatus(orderId, options.identity, options.role, { asOf: options.asOf });
    if (options.json) {
      console.log(JSON.stringify(view, null, 2));
      return;
    }
    if (!view) {
      console.log('\n  No data available for this request.\n');
      return;
    }
    this.printOrder(view);
  }

  private printOrder(view: OrderStatusView): void {
    const color = view.overdue ? 'red' : 'green';
    console.log(`
  ${c('bold', `Order ${view.orderId}`)}  ${view.status}  ${c(color, view.delayStatus)}
    Ordered             ${view.orderDate}
    Shipped             ${view.shipDate ?? '—'}${view.processingDays === null ? '' : c('gray', ` (${view.processingDays}d processing)`)}
    Estimated delivery  ${view.estimatedDelivery}
    Shipping method     ${view.shippingMethod ?? '—'}
`);
  }

  private async runAnomalies(options: CliOptions): Promise<void> {
    const report = await this.getEngine().revenueAnomalies(options.identity, options.role, {
      asOf: options.asOf,
      days: options.days,
      threshold: options.threshold,
    });
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    this.printAnomalies(report);
  }

  private printAnomalies(report: RevenueAnomalyReport | null): void {
    if (!report) {
      console.log('\n  No data available for this request.\n');
      return;
    }
    const headline = report.anomalies.length > 0
      ? c('yellow', `${report.anomalies.length} revenue anomalies detected`)
      : c('green', 'No significant revenue anomalies');
    console.log(`\n  ${c('bold', `Revenue ${report.periodStart} → ${report.periodEnd}:`)} ${headline}`);
    console.log(`    Total ${formatMoney(report.recentTotal)} · average ${formatMoney(report.recentAverage)}`
      + ` (historical ${formatMoney(report.historicalAverage)}) · trend ${report.trend}`);
    for (const a of report.anomalies) {
      const sign = a.zScore > 0 ? '+' : '';
      console.log(`    ${a.date}  ${a.revenueId.padEnd(10)} ${formatMoney(a.amount).padStart(12)}  ${sign}${a.zScore.toFixed(2)}σ ${a.direction}`);
    }
    console.log();
  }

  private async runAudit(options: CliOptions): Promise<void> {
    const report = await this.getEngine().audit(options.identity, options.role, { asOf: options.asOf });
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    this.printAudit(report);
  }

  private printAudit(report: AuditReport): void {
    const revenue = report.revenue === 'alert' ? c('yellow', 'ALERT') : c('green', 'normal');
    const logistics = report.logistics === 'critical' ? c('red', 'CRITICAL')
      : report.logistics === 'warning' ? c('yellow', 'warning') : c('green', 'normal');
    console.log(`\n  ${c('bold', `System audit ${report.asOf}`)}   revenue ${revenue}   logistics ${logistics}\n`);
    for (const line of report.summary.split('\n')) console.log(`    ${line}`);
    console.log();
  }

  // ── Errors ──────────────────────────────────────────────────────

  printError(err: unknown): void {
    if (err instanceof EngineError) {
      console.error(`  ${c('red', 'Error:')} ${err.userMessage} ${c('gray', `[${err.code}]`)}`);
    } else if (err instanceof ConfigError) {
      console.error(`  ${c('red', 'Configuration error:')} ${err.message}`);
    } else {
      console.error(`  ${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(topic?: CommandName): void {
    if (topic === 'ask') {
      console.log(`
  ${c('bold', 'insight ask')} — Answer a question within the caller's scope

  ${c('bold', 'Usage:')}
    insight ask [options] "<question>"
    insight ask -i

  ${c('bold', 'Options:')}
    --role <customer|business>    Caller role (default: business)
    --as <id>                     Caller identity; a customer id for --role customer
    --as-of <YYYY-MM-DD>          Evaluate relative dates against this day
    --json                        Print the full structured result
    -i, --interactive             Start interactive REPL mode

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required. Your Anthropic API key.
    INSIGHT_MODEL                 Model override.
    INSIGHT_STORE                 "file" (default) or "firestore".
`);
      return;
    }

    console.log(`
  ${c('bold', 'Insight Desk')} — role-scoped questions and alerts over order data

  ${c('bold', 'Usage:')}
    insight ask "<question>"              Answer a question (see insight help ask)
    insight forecast                      Stock-out risk per product (business)
    insight delays                        Overdue and at-risk orders
    insight order <orderId>               Status of a single order
    insight anomalies [--days n]          Revenue anomaly scan (business)
    insight audit                         Revenue and logistics health (business)
    insight schema                        Queryable tables for a role
    insight --help                        Show this help

  ${c('bold', 'Common options:')}
    --role <customer|business>  --as <id>  --as-of <YYYY-MM-DD>  --json

  ${c('bold', 'Examples:')}
    insight ask --role customer --as CUST_001 "Where are my orders?"
    insight ask "Revenue by payment method"
    insight delays --min-overdue 3 --window 2
    insight anomalies --days 7 --threshold 2
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new InsightCli();
cli.start().catch((err: unknown) => {
  cli.printError(err);
  process.exit(1);
});
