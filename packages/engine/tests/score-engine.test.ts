// Tests for ScoreEngine: normalization, pillar means, weighted total, grade buckets

import { describe, it, expect } from 'vitest';
import { ScoreEngine, normalizeIndicator } from '../scoring/score-engine.js';
import { DEFAULT_POLICY } from '../config/policy.js';
import { ValidationError } from '../utils/errors.js';
import type { IndicatorRecord } from '../types/scoring.js';
import { breakdownFor, uniformPolicy, uniformRecord } from './fixtures/records.js';

describe('normalizeIndicator', () => {
  it('scales higher-is-better values onto 0-100', () => {
    expect(normalizeIndicator(0.25, { min: 0, max: 1, direction: 'higher' })).toBe(25);
  });

  it('inverts lower-is-better values', () => {
    expect(normalizeIndicator(1, { min: 0, max: 2, direction: 'lower' })).toBe(50);
    expect(normalizeIndicator(0, { min: 0, max: 10, direction: 'lower' })).toBe(100);
  });
});

describe('ScoreEngine', () => {
  describe('evaluate', () => {
    it('scores uniform pillars to their means (total 80.0 → A-)', () => {
      const b = breakdownFor(80, 70, 90);
      expect(b.E).toBe(80);
      expect(b.S).toBe(70);
      expect(b.G).toBe(90);
      expect(b.total).toBe(80);
      expect(b.grade).toBe('A-');
      expect(b.discountPct).toBe(1.8);
    });

    it('subtracts the supply-chain adjustment from E only (total 77.0 → B+)', () => {
      const b = breakdownFor(80, 70, 90, 10);
      expect(b.E).toBe(70);
      expect(b.S).toBe(70);
      expect(b.G).toBe(90);
      expect(b.total).toBe(77);
      expect(b.grade).toBe('B+');
      expect(b.discountPct).toBe(1.3);
      expect(b.scopeAdjustment).toBe(10);
    });

    it('floors E at zero when the adjustment exceeds it', () => {
      const b = breakdownFor(20, 70, 90, 50);
      expect(b.E).toBe(0);
      expect(b.total).toBe(56);
      expect(b.grade).toBe('C');
    });

    it('normalizes the default registry by range and direction', () => {
      const engine = new ScoreEngine(DEFAULT_POLICY);
      const record: IndicatorRecord = {
        company: { name: 'Default Co', industry: 'retail', sizeClass: 'small' },
        environmental: { renewable_energy_ratio: 0.5, waste_recycling_rate: 0.5, carbon_intensity_ratio: 1 },
        social: {
          diversity_ratio: 0.5,
          accident_rate: 0.5,
          customer_satisfaction: 50,
          donation_ratio: 0.025,
          employee_retention_rate: 0.5,
        },
        governance: { independent_director_ratio: 0.5, disclosure_score: 50, ethics_violations: 5 },
      };
      const b = engine.evaluate(record);
      expect(b.E).toBe(50);
      expect(b.S).toBe(50);
      expect(b.G).toBe(50);
      expect(b.details.E.carbon_intensity_ratio).toEqual({ raw: 1, normalized: 50 });
      expect(b.grade).toBe('C');
    });

    it('counts missing registry indicators as zero and reports them', () => {
      const record = uniformRecord(80, 70, 90);
      const b = new ScoreEngine(uniformPolicy).evaluate({ ...record, environmental: { e1: 80, e2: 80 } });
      expect(b.E).toBe(53.33);
      expect(b.missing.E).toEqual(['e3']);
      expect(b.details.E.e3).toEqual({ raw: null, normalized: 0 });
      expect(b.missing.S).toEqual([]);
    });

    it('rejects an indicator the registry does not know', () => {
      const record = uniformRecord(80, 70, 90);
      const engine = new ScoreEngine(uniformPolicy);
      try {
        engine.evaluate({ ...record, environmental: { ...record.environmental, bogus: 1 } });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (!(err instanceof ValidationError)) return;
        expect(err.subject).toBe('Acme Test Co');
        expect(err.field).toBe('environmental.bogus');
      }
    });

    it('rejects out-of-range raw values', () => {
      const record = uniformRecord(80, 70, 90);
      expect(() => new ScoreEngine(uniformPolicy).evaluate({ ...record, governance: { g1: 101, g2: 90, g3: 90 } }))
        .toThrow('governance.g1 = 101 is outside [0, 100]');
    });

    it('rejects non-numeric and non-finite values', () => {
      const record = uniformRecord(80, 70, 90);
      const engine = new ScoreEngine(uniformPolicy);
      expect(() => engine.evaluate({ ...record, social: JSON.parse('{"s1": "70"}') }))
        .toThrow(ValidationError);
      expect(() => engine.evaluate({ ...record, social: { s1: Number.NaN } }))
        .toThrow('Acme Test Co: social.s1 must be numeric');
      expect(() => engine.evaluate({ ...record, social: { s1: Number.POSITIVE_INFINITY } }))
        .toThrow('Acme Test Co: social.s1 must be finite');
    });

    it('carries the company industry and size class', () => {
      const b = breakdownFor(80, 70, 90);
      expect(b.industry).toBe('manufacturing');
      expect(b.sizeClass).toBe('mid');
    });

    it('reports regulatory compliance as the share of frameworks met', () => {
      const engine = new ScoreEngine(uniformPolicy);
      const record: IndicatorRecord = { ...uniformRecord(80, 70, 90), compliance: { kTaxonomy: true, gri: true } };
      expect(engine.evaluate(record).compliance).toEqual({ kTaxonomy: true, tcfd: false, gri: true, overall: 66.7 });
      expect(engine.evaluate(uniformRecord(80, 70, 90)).compliance).toEqual({
        kTaxonomy: false, tcfd: false, gri: false, overall: 0,
      });
    });

    it('rejects an unknown compliance flag', () => {
      const engine = new ScoreEngine(uniformPolicy);
      const record = { ...uniformRecord(80, 70, 90), compliance: { tcfd: true, sasb: true } };
      expect(() => engine.evaluate(record)).toThrow(ValidationError);
    });

    it('rejects a negative scope adjustment', () => {
      expect(() => breakdownFor(80, 70, 90, -1)).toThrow(ValidationError);
    });

    it('is pure: same input, same frozen output', () => {
      const engine = new ScoreEngine(uniformPolicy);
      const record = uniformRecord(72.5, 64, 88);
      const first = engine.evaluate(record, 3);
      const second = engine.evaluate(record, 3);
      expect(second).toEqual(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.details.E)).toBe(true);
    });
  });

  describe('grade boundaries', () => {
    const cases: Array<[number, string, number]> = [
      [90, 'A+', 2.7],
      [89.99, 'A', 2.2],
      [85, 'A', 2.2],
      [80, 'A-', 1.8],
      [75, 'B+', 1.3],
      [70, 'B', 1.2],
      [65, 'B-', 0.8],
      [64.99, 'C', 0.4],
      [0, 'C', 0.4],
    ];

    it.each(cases)('total %d grades %s with discount %d', (score, grade, discount) => {
      const b = breakdownFor(score, score, score);
      expect(b.total).toBe(score);
      expect(b.grade).toBe(grade);
      expect(b.discountPct).toBe(discount);
    });

    it('grades on the reported (rounded) total', () => {
      const b = breakdownFor(79.999, 79.999, 79.999);
      expect(b.total).toBe(80);
      expect(b.grade).toBe('A-');
    });

    it('gradeFor covers the whole scale', () => {
      const engine = new ScoreEngine();
      expect(engine.gradeFor(100)).toBe('A+');
      expect(engine.gradeFor(74.99)).toBe('B');
      expect(engine.gradeFor(0)).toBe('C');
    });
  });

  describe('improvementAreas', () => {
    it('lists pillars below 70, weakest first', () => {
      const engine = new ScoreEngine(uniformPolicy);
      expect(engine.improvementAreas(breakdownFor(60, 50, 90))).toEqual(['S', 'E']);
      expect(engine.improvementAreas(breakdownFor(70, 70, 70))).toEqual([]);
    });
  });

  it('exposes the policy weights', () => {
    expect(new ScoreEngine().weights).toEqual({ E: 0.3, S: 0.35, G: 0.35 });
  });
});
