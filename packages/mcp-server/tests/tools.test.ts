import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createToolContext } from '../src/tools/context.js';
import { registerScoringTools } from '../src/tools/scoring.js';
import { registerSupplyChainTools } from '../src/tools/supply_chain.js';
import { registerForecastingTools } from '../src/tools/forecasting.js';
import { registerProductTools } from '../src/tools/products.js';
import { registerPipelineTools } from '../src/tools/pipeline.js';

const server = new McpServer({ name: 'esg-credit-test', version: '0.0.0' });
const client = new Client({ name: 'esg-credit-test-client', version: '0.0.0' });

// Every registry indicator at its best value
const leader = {
  company: { name: 'Leader Co', industry: 'energy', sizeClass: 'large' },
  environmental: { renewable_energy_ratio: 1, waste_recycling_rate: 1, carbon_intensity_ratio: 0 },
  social: { diversity_ratio: 1, accident_rate: 0, customer_satisfaction: 100, donation_ratio: 0.05, employee_retention_rate: 1 },
  governance: { independent_director_ratio: 1, disclosure_score: 100, ethics_violations: 0 },
};

function history(length: number) {
  return Array.from({ length }, (_, i) => ({
    period: `2023-${String(i + 1).padStart(2, '0')}`,
    E: 70 + i,
    S: 75,
    G: 80 - (i % 2),
  }));
}

async function call(name: string, args: Record<string, unknown>): Promise<{ isError: boolean; body: unknown }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [text] = result.content.flatMap(c => (c.type === 'text' ? [c.text] : []));
  return { isError: result.isError ?? false, body: JSON.parse(text ?? 'null') };
}

beforeAll(async () => {
  const ctx = createToolContext({});
  registerScoringTools(server, ctx);
  registerSupplyChainTools(server, ctx);
  registerForecastingTools(server, ctx);
  registerProductTools(server, ctx);
  registerPipelineTools(server, ctx);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterAll(async () => {
  await client.close();
  await server.close();
});

describe('ESG credit tools', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([
      'esg_benefits',
      'esg_evaluate',
      'esg_features',
      'esg_forecast',
      'esg_grade_upgrade',
      'esg_improvement_drivers',
      'esg_loan_terms',
      'esg_match_products',
      'esg_pipeline',
      'esg_supply_chain',
    ]);
  });

  describe('esg_evaluate', () => {
    it('scores a company and lists improvement areas', async () => {
      const { isError, body } = await call('esg_evaluate', leader);
      expect(isError).toBe(false);
      expect(body).toMatchObject({
        company: 'Leader Co',
        E: 100,
        S: 100,
        G: 100,
        total: 100,
        grade: 'A+',
        discountPct: 2.7,
        improvementAreas: [],
      });
    });

    it('reports compliance flags with the overall share', async () => {
      const { body } = await call('esg_evaluate', { ...leader, compliance: { kTaxonomy: true, tcfd: true, gri: true } });
      expect(body).toMatchObject({ compliance: { kTaxonomy: true, tcfd: true, gri: true, overall: 100 } });
    });

    it('returns a validation error naming the company', async () => {
      const { isError, body } = await call('esg_evaluate', {
        ...leader,
        environmental: { ...leader.environmental, renewable_energy_ratio: 1.5 },
      });
      expect(isError).toBe(true);
      expect(body).toEqual({
        error: 'Leader Co: environmental.renewable_energy_ratio = 1.5 is outside [0, 1]',
        type: 'ValidationError',
        subject: 'Leader Co',
      });
    });
  });

  describe('esg_supply_chain', () => {
    it('aggregates suppliers and keeps their ids verbatim', async () => {
      const { body } = await call('esg_supply_chain', {
        suppliers: [
          { supplierId: '007', emissions: 100, esgScore: 40, weight: 1 },
          { supplierId: '008', emissions: 50, esgScore: 90, weight: 1 },
        ],
      });
      expect(body).toMatchObject({
        supplierCount: 2,
        scope3Emissions: 75,
        riskPropagation: 7.5,
        weights: { '007': 0.5, '008': 0.5 },
      });
    });
  });

  describe('esg_features', () => {
    it('sends unfilled windows as null', async () => {
      const { body } = await call('esg_features', { history: history(2) });
      expect(body).toMatchObject({
        rows: [
          { period: '2023-01', complete: false, metrics: { E: { value: 70, rollingMean3: null } } },
          { period: '2023-02', complete: false, metrics: { E: { value: 71, rollingMean3: null } } },
        ],
      });
    });
  });

  describe('esg_forecast', () => {
    it('refuses a history shorter than seven months', async () => {
      const { isError, body } = await call('esg_forecast', { history: history(6) });
      expect(isError).toBe(true);
      expect(body).toMatchObject({ type: 'InsufficientHistoryError', subject: 'series' });
    });

    it('forecasts the requested horizon with the configured seed', async () => {
      const { isError, body } = await call('esg_forecast', { history: history(10), horizon_months: 3 });
      expect(isError).toBe(false);
      expect(body).toMatchObject({
        origin: '2023-10',
        horizon: 3,
        periods: ['2023-11', '2023-12', '2024-01'],
        seed: 42,
      });
    });
  });

  describe('esg_match_products', () => {
    it('matches the bundled catalog and fails projected conditions without history', async () => {
      const { body } = await call('esg_match_products', leader);
      expect(body).toMatchObject({ company: 'Leader Co', grade: 'A+', forecastSkipped: 'no history supplied' });

      const matches = expect.arrayContaining([
        expect.objectContaining({ productId: 'sustainability-linked-loan', eligible: false, failedConditions: ['projected_total_score'] }),
        expect.objectContaining({ productId: 'esg-partner-loan', eligible: true }),
      ]);
      expect(body).toMatchObject({ matches });
    });

    it('uses a catalog supplied with the call', async () => {
      const { body } = await call('esg_match_products', {
        ...leader,
        products: [{ id: 'only', name: 'Only Loan', baseRate: 5, esgDiscount: true, conditions: { min_grade: 'A' } }],
      });
      expect(body).toMatchObject({
        matches: [{ productId: 'only', eligible: true, discountPct: 2.7, effectiveRate: 2.3 }],
      });
    });

    it('rejects an unknown product condition', async () => {
      const { isError, body } = await call('esg_match_products', {
        ...leader,
        products: [{ id: 'odd', name: 'Odd Loan', baseRate: 5, esgDiscount: true, conditions: { min_vibes: 1 } }],
      });
      expect(isError).toBe(true);
      expect(body).toEqual({ error: 'odd: unknown condition "min_vibes"', type: 'ValidationError', subject: 'odd' });
    });
  });

  describe('esg_improvement_drivers', () => {
    it('plans the cheapest route to the next grade', async () => {
      // E drops to 60 under the penalty: total 88 (A), 2 short of A+
      const { isError, body } = await call('esg_improvement_drivers', { ...leader, scope_adjustment: 40 });
      expect(isError).toBe(false);
      expect(body).toMatchObject({
        currentGrade: 'A',
        targetGrade: 'A+',
        gap: 2,
        status: 'reachable',
        plan: ['green_certification', 'water_efficiency'],
        planCost: 200,
        planMonths: 9,
        projectedTotal: 91.9,
        projectedGrade: 'A+',
      });
    });
  });

  describe('esg_benefits', () => {
    it('prices the package on the best eligible product', async () => {
      const { isError, body } = await call('esg_benefits', {
        ...leader,
        loan_amount: 1000,
        additional_benefits: 50,
        products: [
          { id: 'green', name: 'Green Loan', baseRate: 4, esgDiscount: true, maxAmount: 500, conditions: { target_industries: ['energy'] } },
          { id: 'plain', name: 'Plain Loan', baseRate: 5, esgDiscount: false },
        ],
      });
      expect(isError).toBe(false);
      expect(body).toMatchObject({
        company: 'Leader Co',
        grade: 'A+',
        package: {
          products: [{ productId: 'green', discountPct: 2.7, financedAmount: 500, annualSavings: 13.5 }],
          bestProductId: 'green',
          annualSavings: 13.5,
          cumulativeSavings: 67.5,
          packageValue: 117.5,
        },
        gradeDiscount: { baseRate: 3.5, discountPct: 2.7, finalRate: 0.8, annualSavings: 27 },
      });
    });
  });

  describe('esg_loan_terms', () => {
    it('computes a zero-rate schedule', async () => {
      const { body } = await call('esg_loan_terms', { amount: 12000, rate: 0, term_years: 1 });
      expect(body).toEqual({
        amount: 12000,
        rate: 0,
        termYears: 1,
        monthlyPayment: 1000,
        totalPayment: 12000,
        totalInterest: 0,
      });
    });
  });

  describe('esg_grade_upgrade', () => {
    it('rejects a target below the current grade', async () => {
      const { isError, body } = await call('esg_grade_upgrade', { ...leader, target_grade: 'B' });
      expect(isError).toBe(true);
      expect(body).toMatchObject({ type: 'ValidationError', subject: 'Leader Co' });
    });
  });

  describe('esg_pipeline', () => {
    it('runs every stage for one company', async () => {
      const { isError, body } = await call('esg_pipeline', {
        ...leader,
        history: history(10),
        horizon_months: 2,
        products: [{ id: 'open', name: 'Open Loan', baseRate: 5, esgDiscount: false }],
      });
      expect(isError).toBe(false);
      expect(body).toMatchObject({
        company: 'Leader Co',
        asOfPeriod: '2023-11',
        supplierAssessment: null,
        breakdown: { grade: 'A+' },
        forecast: { origin: '2023-11', periods: ['2023-12', '2024-01'] },
        matches: [{ productId: 'open', eligible: true, effectiveRate: 5 }],
        improvementPlan: { targetGrade: 'A+', status: 'achieved', plan: [] },
        benefits: null,
      });
    });

    it('estimates benefits when given a loan amount', async () => {
      const { body } = await call('esg_pipeline', {
        ...leader,
        loan_amount: 1000,
        products: [{ id: 'open', name: 'Open Loan', baseRate: 5, esgDiscount: true }],
      });
      expect(body).toMatchObject({
        benefits: { bestProductId: 'open', annualSavings: 27, cumulativeSavings: 135, packageValue: 135 },
      });
    });
  });
});
