#!/usr/bin/env node
// esg-credit: command-line front end for the ESG credit engine
//
// Usage:
//   esg-credit evaluate companies.json                     # score every company
//   esg-credit forecast companies.json "Hanbit Materials"  # E/S/G trajectory
//   esg-credit match companies.json --products products.json --loan-amount 1000
//   esg-credit batch companies.json --concurrency 4        # full pipeline + comparison
//   esg-credit --help

import 'dotenv/config';
import { BUNDLED_PRODUCT_CATALOG } from '../catalog/bundled.js';
import { loadCompanyCatalog, loadProductCatalog } from '../catalog/loader.js';
import { DEFAULT_CONDITION_REGISTRY } from '../config/conditions.js';
import { DEFAULT_POLICY } from '../config/policy.js';
import { DEFAULT_SETTINGS, loadSettings, type Settings } from '../config/settings.js';
import { FeatureBuilder } from '../forecast/feature-builder.js';
import { ForecastModel, summarizeConfidence } from '../forecast/forecast-model.js';
import { BatchEvaluator } from '../orchestrator/batch-evaluator.js';
import { EsgPipeline, type PipelineResult } from '../orchestrator/pipeline.js';
import { ScoreEngine } from '../scoring/score-engine.js';
import { SupplyChainAnalyzer } from '../supply-chain/supply-chain-analyzer.js';
import { errorSubject, isEngineError } from '../utils/errors.js';
import { PILLARS } from '../types/scoring.js';
import type { CompanyProfile } from '../types/catalog.js';


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
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function flag(met: boolean): string {
  return met ? 'yes' : 'no';
}

function gradeColor(grade: string): keyof typeof ansi {
  if (grade.startsWith('A')) return 'green';
  if (grade.startsWith('B')) return 'yellow';
  return 'red';
}

// ── Argument parsing ────────────────────────────────────────────────

interface CliOptions {
  positional: string[];
  json: boolean;
  horizon?: number;
  products: string;
  concurrency: number;
  loanAmount?: number;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function positiveInt(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < 1) {
    throw new UsageError(`${flag} needs a positive integer (got ${value ?? 'nothing'})`);
  }
  return n;
}

function positiveNumber(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isFinite(n) || n <= 0) {
    throw new UsageError(`${flag} needs a positive number (got ${value ?? 'nothing'})`);
  }
  return n;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { positional: [], json: false, products: BUNDLED_PRODUCT_CATALOG, concurrency: 3 };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      options.json = true;
    } else if (arg === '--horizon') {
      options.horizon = positiveInt(arg, args[++i]);
    } else if (arg === '--loan-amount') {
      options.loanAmount = positiveNumber(arg, args[++i]);
    } else if (arg === '--concurrency') {
      options.concurrency = positiveInt(arg, args[++i]);
    } else if (arg === '--products') {
      const path = args[++i];
      if (path === undefined) throw new UsageError('--products needs a file path');
      options.products = path;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      options.positional.push(arg);
    }
  }

  return options;
}

// ── CLI class ───────────────────────────────────────────────────────

class EsgCli {
  private settings: Settings = DEFAULT_SETTINGS;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.includes('--help') || rawArgs.includes('-h') || rawArgs.length === 0) {
      this.printHelp();
      return;
    }

    this.settings = loadSettings();
    const command = rawArgs[0];
    const options = parseArgs(rawArgs.slice(1));

    switch (command) {
      case 'evaluate':
        this.evaluate(options);
        break;
      case 'forecast':
        this.forecast(options);
        break;
      case 'match':
        await this.match(options);
        break;
      case 'batch':
        await this.batch(options);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  }

  // ── Subcommand: evaluate ────────────────────────────────────────

  private evaluate(options: CliOptions): void {
    const companies = this.companies(options);
    const analyzer = new SupplyChainAnalyzer(this.settings.supplyChain);
    const engine = new ScoreEngine(DEFAULT_POLICY);

    const breakdowns = companies.map(company => {
      const name = company.indicators.company.name;
      const scope = analyzer.aggregate(company.suppliers, name);
      return engine.evaluate(company.indicators, scope.riskPropagation);
    });

    if (options.json) {
      console.log(JSON.stringify(breakdowns, null, 2));
      return;
    }

    console.log(`\n  ${c('bold', 'ESG Evaluation')} ${c('dim', `(${breakdowns.length} companies)`)}\n`);
    for (const b of breakdowns) {
      const areas = engine.improvementAreas(b);
      console.log(`  ${c('bold', b.company)}  ${c(gradeColor(b.grade), b.grade)}  total ${b.total}  ${c('dim', `discount ${b.discountPct}%p`)}`);
      console.log(`    ${c('dim', `E ${b.E} | S ${b.S} | G ${b.G} | supply-chain penalty ${b.scopeAdjustment.toFixed(2)}`)}`);
      console.log(`    ${c('dim', `compliance ${b.compliance.overall}% (K-Taxonomy ${flag(b.compliance.kTaxonomy)}, TCFD ${flag(b.compliance.tcfd)}, GRI ${flag(b.compliance.gri)})`)}`);
      if (areas.length > 0) console.log(`    ${c('yellow', 'Improve:')} ${areas.join(', ')}`);
    }
    console.log();
  }

  // ── Subcommand: forecast ────────────────────────────────────────

  private forecast(options: CliOptions): void {
    const [, name] = options.positional;
    if (name === undefined) throw new UsageError('forecast needs a company name');
    const company = this.companies(options).find(p => p.indicators.company.name === name);
    if (company === undefined) throw new UsageError(`No company named "${name}" in the catalog`);

    const model = new ForecastModel(this.settings.forecast);
    const features = new FeatureBuilder().build(company.history, name);
    const trained = model.fit(features, name);
    const result = model.predict(trained, options.horizon ?? this.settings.forecast.horizon);
    const confidence = summarizeConfidence(result);

    if (options.json) {
      console.log(JSON.stringify({ ...result, summary: confidence }, null, 2));
      return;
    }

    console.log(`\n  ${c('bold', `Forecast: ${name}`)} ${c('dim', `(${result.horizon} months from ${result.origin}, seed ${model.seed})`)}\n`);
    console.log(`  ${c('dim', 'Period    ')}${PILLARS.map(p => c('dim', `${p.padStart(7)}`)).join('')}`);
    result.periods.forEach((period, i) => {
      console.log(`  ${period}   ${PILLARS.map(p => result.predictions[p][i].toFixed(2).padStart(7)).join('')}`);
    });
    console.log(`\n  Confidence: ${c(confidence.reliability === 'high' ? 'green' : confidence.reliability === 'medium' ? 'yellow' : 'red', `${confidence.score} (${confidence.reliability})`)}\n`);
  }

  // ── Subcommand: match ───────────────────────────────────────────

  private async match(options: CliOptions): Promise<void> {
    const companies = this.companies(options);
    const catalog = loadProductCatalog(options.products);
    const pipeline = new EsgPipeline({
      policy: DEFAULT_POLICY,
      registry: DEFAULT_CONDITION_REGISTRY,
      settings: this.settings,
      onStatus: (stage, message) => {
        if (!options.json) process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', message)}\n`);
      },
    });

    const results: PipelineResult[] = [];
    for (const company of companies) {
      results.push(await pipeline.run(company, { catalog, horizonMonths: options.horizon, loanAmount: options.loanAmount }));
    }

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    for (const r of results) {
      console.log(`\n  ${c('bold', r.company)}  ${c(gradeColor(r.breakdown.grade), r.breakdown.grade)}  total ${r.breakdown.total}`);
      if (r.forecastSkipped !== undefined) console.log(`  ${c('yellow', 'Forecast skipped:')} ${c('dim', r.forecastSkipped)}`);
      for (const m of r.matches) {
        const mark = m.eligible ? c('green', '✓') : c('red', '✗');
        const why = m.eligible ? '' : c('dim', ` (failed: ${m.failedConditions.join(', ')})`);
        console.log(`    ${mark} ${m.productName.padEnd(44)} ${m.effectiveRate.toFixed(2)}%${why}`);
      }
      const plan = r.improvementPlan;
      if (plan.status !== 'achieved') {
        const route = plan.plan.length > 0 ? plan.plan.join(', ') : 'no factor helps';
        console.log(`    ${c('cyan', `To ${plan.targetGrade}:`)} ${route} ${c('dim', `(+${plan.gap} needed, cost ${plan.planCost}, ${plan.planMonths} months, ${plan.status})`)}`);
      }
      if (r.benefits !== null && r.benefits.bestProductId !== null) {
        console.log(`    ${c('green', 'Savings:')} ${r.benefits.annualSavings}/year on ${r.benefits.bestProductId}, ${r.benefits.cumulativeSavings} over ${r.benefits.years} years`);
      }
    }
    console.log();
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async batch(options: CliOptions): Promise<void> {
    const companies = this.companies(options);
    const catalog = loadProductCatalog(options.products);
    const evaluator = new BatchEvaluator({ settings: this.settings });

    const result = await evaluator.evaluate(companies, {
      catalog,
      horizonMonths: options.horizon,
      loanAmount: options.loanAmount,
      concurrency: options.concurrency,
      onProgress: (p) => {
        if (options.json || p.status === 'running') return;
        const mark = p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        process.stderr.write(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}${p.error ? ` ${c('red', p.error)}` : ''}\n`);
      },
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\n${result.comparative}`);
      console.log(`  ${c('dim', `${(result.totalDurationMs / 1000).toFixed(1)}s`)}\n`);
    }

    if (result.companies.some(o => o.error !== undefined)) process.exitCode = 1;
  }

  private companies(options: CliOptions): CompanyProfile[] {
    const [path] = options.positional;
    if (path === undefined) throw new UsageError('Missing companies.json path');
    return loadCompanyCatalog(path);
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'esg-credit')}: ESG scoring, forecasting and product matching

  ${c('bold', 'Usage:')}
    esg-credit evaluate <companies.json>            Score companies (supply-chain adjusted)
    esg-credit forecast <companies.json> <name>     Forecast one company's E/S/G
    esg-credit match <companies.json>               Full pipeline, matched products per company
    esg-credit batch <companies.json>               Full pipeline with a comparative report

  ${c('bold', 'Options:')}
    --horizon <months>            Forecast horizon (default: ESG_FORECAST_HORIZON or 12)
    --products <products.json>    Product catalog (default: bundled data/products.json)
    --concurrency <n>             Companies in flight for batch (default: 3)
    --loan-amount <amount>        Estimate interest savings on a loan of this size
    --json                        Print machine-readable JSON
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ESG_FORECAST_SEED, ESG_FORECAST_TREES, ESG_FORECAST_MAX_DEPTH, ESG_FORECAST_HORIZON,
    ESG_CONFIDENCE_Z, ESG_SUPPLIER_TARGET_SCORE, ESG_SUPPLIER_RISK_SCALE
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new EsgCli();
cli.start().catch((err: unknown) => {
  if (isEngineError(err)) {
    console.error(`${c('red', `${err.name}:`)} ${err.message} ${c('dim', `[${errorSubject(err)}]`)}`);
  } else {
    console.error(`${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(err instanceof UsageError ? 2 : 1);
});
