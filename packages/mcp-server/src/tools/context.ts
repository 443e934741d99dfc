import {
  BUNDLED_PRODUCT_CATALOG,
  DEFAULT_CONDITION_REGISTRY,
  DEFAULT_POLICY,
  loadProductCatalog,
  loadSettings,
  parseProductCatalog,
  type ConditionRegistry,
  type Policy,
  type ProductSpec,
  type Settings,
} from "@esg-credit/engine";

/** Shared configuration for every tool registered on one server. */
export interface ToolContext {
  settings: Settings;
  policy: Policy;
  registry: ConditionRegistry;
  /** Catalog used when a call supplies no products. */
  defaultProducts: () => ProductSpec[];
}

export function createToolContext(env: NodeJS.ProcessEnv = process.env): ToolContext {
  let cached: ProductSpec[] | null = null;
  return {
    settings: loadSettings(env),
    policy: DEFAULT_POLICY,
    registry: DEFAULT_CONDITION_REGISTRY,
    defaultProducts: () => {
      // Blank counts as unset, as in loadSettings.
      cached ??= loadProductCatalog(env.ESG_PRODUCT_CATALOG?.trim() || BUNDLED_PRODUCT_CATALOG);
      return cached;
    },
  };
}

/** Validate call-supplied products, or fall back to the context's catalog. */
export function resolveProducts(ctx: ToolContext, products: unknown[] | undefined): ProductSpec[] {
  if (products === undefined) return ctx.defaultProducts();
  return parseProductCatalog({ products }, "products", { policy: ctx.policy, registry: ctx.registry });
}
