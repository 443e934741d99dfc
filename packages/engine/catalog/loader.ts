// Catalog loading: JSON files read with node:fs, validated entry by entry.
// Every failure is a ValidationError naming the company or product concerned.

import { readFileSync } from 'node:fs';
import type { ZodError } from 'zod';
import { DEFAULT_CONDITION_REGISTRY, type ConditionRegistry } from '../config/conditions.js';
import { DEFAULT_POLICY, type Policy } from '../config/policy.js';
import { validateSeries } from '../forecast/feature-builder.js';
import { ProductMatcher } from '../products/product-matcher.js';
import { ValidationError } from '../utils/errors.js';
import type { CompanyProfile } from '../types/catalog.js';
import type { ProductSpec } from '../types/products.js';
import { CompanyCatalogSchema, CompanyEntrySchema, ProductCatalogSchema } from './schemas.js';

function firstIssue(error: ZodError, prefix: string): { field: string; message: string } {
  const issue = error.issues[0];
  const path = issue.path.join('.');
  return { field: path ? `${prefix}.${path}` : prefix, message: issue.message };
}

function readJson(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Cannot read catalog ${path}: ${reason}`, path);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Catalog ${path} is not valid JSON: ${reason}`, path);
  }
}

function entryName(entry: unknown, fallback: string): string {
  if (entry !== null && typeof entry === 'object' && 'company' in entry) {
    const company = entry.company;
    if (company !== null && typeof company === 'object' && 'name' in company && typeof company.name === 'string') {
      return company.name;
    }
  }
  return fallback;
}

/**
 * Validate a parsed company catalog (`{ companies: [...] }`).
 * Histories are checked for order here, before any pipeline runs.
 */
export function parseCompanyCatalog(input: unknown, source = 'companies'): CompanyProfile[] {
  const outer = CompanyCatalogSchema.safeParse(input);
  if (!outer.success) {
    const { field, message } = firstIssue(outer.error, 'companies');
    throw new ValidationError(`${source}: ${field} ${message}`, source, field);
  }

  const seen = new Set<string>();
  return outer.data.companies.map((raw, i) => {
    const subject = entryName(raw, `companies[${i}]`);
    const parsed = CompanyEntrySchema.safeParse(raw);
    if (!parsed.success) {
      const { field, message } = firstIssue(parsed.error, subject);
      throw new ValidationError(`${source}: ${field} ${message}`, subject, field);
    }

    const { history, suppliers, ...indicators } = parsed.data;
    if (seen.has(indicators.company.name)) {
      throw new ValidationError(`${source}: company "${subject}" is listed twice`, subject, 'company.name');
    }
    seen.add(indicators.company.name);
    validateSeries(history, subject);

    return { indicators, history, suppliers };
  });
}

export interface ProductCatalogOptions {
  policy?: Policy;
  registry?: ConditionRegistry;
}

/**
 * Validate a parsed product catalog (`{ products: [...] }`) against the
 * condition registry. Product ids must be unique.
 */
export function parseProductCatalog(input: unknown, source = 'products', options: ProductCatalogOptions = {}): ProductSpec[] {
  const outer = ProductCatalogSchema.safeParse(input);
  if (!outer.success) {
    const { field, message } = firstIssue(outer.error, 'products');
    throw new ValidationError(`${source}: ${field} ${message}`, source, field);
  }

  const matcher = new ProductMatcher(options.policy ?? DEFAULT_POLICY, options.registry ?? DEFAULT_CONDITION_REGISTRY);
  const seen = new Set<string>();
  return outer.data.products.map((raw, i) => {
    const product = matcher.validateProduct(raw, i);
    if (seen.has(product.id)) {
      throw new ValidationError(`${source}: product "${product.id}" is listed twice`, product.id, 'id');
    }
    seen.add(product.id);
    return product;
  });
}

export function loadCompanyCatalog(path: string): CompanyProfile[] {
  return parseCompanyCatalog(readJson(path), path);
}

export function loadProductCatalog(path: string, options: ProductCatalogOptions = {}): ProductSpec[] {
  return parseProductCatalog(readJson(path), path, options);
}
