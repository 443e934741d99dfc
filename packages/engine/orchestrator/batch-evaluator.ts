// Batch portfolio evaluation
// Runs the pipeline over N companies with concurrency control; a failing
// company is recorded with its error and never aborts the batch.

import { EsgPipeline, type PipelineConfig, type PipelineResult, type RunOptions } from './pipeline.js';
import { buildComparativeReport } from '../utils/comparative-reporter.js';
import { isEngineError } from '../utils/errors.js';
import type { CompanyProfile } from '../types/catalog.js';

export interface BatchOptions extends RunOptions {
  /** Max companies in flight (default: 3) */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface CompanyOutcome {
  company: string;
  result?: PipelineResult;
  error?: string;
  errorType?: string;
  durationMs: number;
}

export interface BatchResult {
  companies: CompanyOutcome[];
  comparative: string;
  totalDurationMs: number;
}

export class BatchEvaluator {
  private readonly pipeline: EsgPipeline;

  constructor(config?: Partial<PipelineConfig>) {
    this.pipeline = new EsgPipeline(config);
  }

  async evaluate(companies: readonly CompanyProfile[], options: BatchOptions): Promise<BatchResult> {
    const { concurrency = 3, onProgress, ...runOptions } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got ${concurrency})`);
    }

    const totalStart = Date.now();
    const outcomes: CompanyOutcome[] = [];

    for (let i = 0; i < companies.length; i += concurrency) {
      const chunk = companies.slice(i, i + concurrency);

      const pending = chunk.map(async (profile): Promise<CompanyOutcome> => {
        const company = profile.indicators.company.name;
        const companyStart = Date.now();

        onProgress?.({
          completed: outcomes.length,
          total: companies.length,
          current: company,
          status: 'running',
        });

        try {
          const result = await this.pipeline.run(profile, runOptions);
          onProgress?.({
            completed: outcomes.length + 1,
            total: companies.length,
            current: company,
            status: 'completed',
          });
          return { company, result, durationMs: Date.now() - companyStart };
        } catch (err) {
          // Only engine errors belong to one company; anything else is a bug.
          if (!isEngineError(err)) throw err;
          onProgress?.({
            completed: outcomes.length + 1,
            total: companies.length,
            current: company,
            status: 'failed',
            error: err.message,
          });
          return { company, error: err.message, errorType: err.name, durationMs: Date.now() - companyStart };
        }
      });

      outcomes.push(...await Promise.all(pending));
    }

    return {
      companies: outcomes,
      comparative: buildComparativeReport(outcomes),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}
