// Runtime settings from environment variables.
// Forecast and supply-chain constants live here, not in per-call arguments.

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const SettingsSchema = z.object({
  ESG_FORECAST_SEED: z.coerce.number().int().min(0).max(2 ** 32 - 1).default(42),
  ESG_FORECAST_TREES: z.coerce.number().int().min(1).max(500).default(50),
  ESG_FORECAST_MAX_DEPTH: z.coerce.number().int().min(1).max(20).default(5),
  ESG_FORECAST_HORIZON: z.coerce.number().int().min(1).max(36).default(12),
  ESG_CONFIDENCE_Z: z.coerce.number().positive().default(1.96),
  ESG_SUPPLIER_TARGET_SCORE: z.coerce.number().min(0).max(100).default(70),
  ESG_SUPPLIER_RISK_SCALE: z.coerce.number().min(0).default(0.5),
});

export interface ForecastSettings {
  readonly seed: number;
  readonly trees: number;
  readonly maxDepth: number;
  readonly horizon: number;        // default months when a caller gives none
  readonly confidenceZ: number;
}

export interface SupplyChainSettings {
  readonly targetScore: number;
  readonly riskScale: number;
}

export interface Settings {
  readonly forecast: ForecastSettings;
  readonly supplyChain: SupplyChainSettings;
}

/**
 * Read settings from an environment map (defaults to process.env).
 * Empty strings count as unset.
 * @throws ConfigurationError naming the offending variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const relevant: Record<string, string> = {};
  for (const key of Object.keys(SettingsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') relevant[key] = value;
  }

  const parsed = SettingsSchema.safeParse(relevant);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = String(issue.path[0] ?? 'env');
    throw new ConfigurationError(`Invalid ${key}: ${issue.message}`, key);
  }

  const s = parsed.data;
  return {
    forecast: {
      seed: s.ESG_FORECAST_SEED,
      trees: s.ESG_FORECAST_TREES,
      maxDepth: s.ESG_FORECAST_MAX_DEPTH,
      horizon: s.ESG_FORECAST_HORIZON,
      confidenceZ: s.ESG_CONFIDENCE_Z,
    },
    supplyChain: {
      targetScore: s.ESG_SUPPLIER_TARGET_SCORE,
      riskScale: s.ESG_SUPPLIER_RISK_SCALE,
    },
  };
}

export const DEFAULT_SETTINGS: Settings = loadSettings({});
