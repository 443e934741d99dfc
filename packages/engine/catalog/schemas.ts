// Catalog file shapes: companies (indicators, history, suppliers) and products.

import { z } from 'zod';
import { IndicatorRecordSchema } from '../scoring/score-engine.js';
import { SupplierRecordSchema } from '../supply-chain/supply-chain-analyzer.js';
import { SeriesPointSchema } from '../forecast/feature-builder.js';

export const CompanyEntrySchema = IndicatorRecordSchema.extend({
  history: z.array(SeriesPointSchema).default([]),
  suppliers: z.array(SupplierRecordSchema).default([]),
});

export const CompanyCatalogSchema = z.object({
  companies: z.array(z.unknown()),
});

export const ProductCatalogSchema = z.object({
  products: z.array(z.unknown()),
});

export type CompanyEntry = z.infer<typeof CompanyEntrySchema>;
