// Catalog: one company's inputs to a pipeline run

import type { IndicatorRecord } from './scoring.js';
import type { HistoricalSeries } from './forecast.js';
import type { SupplierRecord } from './supply-chain.js';

export interface CompanyProfile {
  readonly indicators: IndicatorRecord;
  readonly history: HistoricalSeries;      // chronological, may be empty
  readonly suppliers: readonly SupplierRecord[];
}
