// Tests for improvement-driver analysis and the factor table

import { describe, it, expect } from 'vitest';
import { analyzeImprovementDrivers, nextGrade } from '../scoring/improvement-drivers.js';
import { DEFAULT_IMPROVEMENT_FACTORS, loadImprovementFactors } from '../config/improvement-factors.js';
import { ConfigurationError } from '../utils/errors.js';
import { breakdownFor, uniformPolicy } from './fixtures/records.js';

const options = { policy: uniformPolicy };

describe('analyzeImprovementDrivers', () => {
  it('closes the gap to the next grade with the most cost-efficient factors', () => {
    // 80/70/90 totals 80 (A-); A starts at 85
    const plan = analyzeImprovementDrivers(breakdownFor(80, 70, 90), undefined, options);

    expect(plan).toMatchObject({
      company: 'Acme Test Co',
      currentGrade: 'A-',
      targetGrade: 'A',
      currentTotal: 80,
      targetTotal: 85,
      gap: 5,
      status: 'reachable',
      plan: ['board_diversity', 'diversity_program'],
      planCost: 130,
      planMonths: 6,
      projectedScores: { E: 80, S: 82, G: 100 },
      projectedTotal: 87.7,
      projectedGrade: 'A',
    });
    expect(plan.recommendations[0]).toEqual({
      factor: 'board_diversity',
      pillar: 'G',
      description: 'Independent and diverse board seats',
      pillarGain: 10,
      totalGain: 3.5,
      cost: 30,
      months: 6,
      efficiency: 0.1167,
    });
  });

  it('caps each gain at the pillar headroom and skips full pillars in the plan', () => {
    const plan = analyzeImprovementDrivers(breakdownFor(80, 70, 90), undefined, options);
    const committee = plan.recommendations.find(r => r.factor === 'esg_committee');
    expect(committee?.pillarGain).toBe(10);
    expect(plan.recommendations.map(r => r.factor).slice(0, 3)).toEqual(['board_diversity', 'esg_committee', 'diversity_program']);
    expect(plan.plan).not.toContain('esg_committee');
  });

  it('ranks every factor in the table', () => {
    const plan = analyzeImprovementDrivers(breakdownFor(50, 50, 50), undefined, options);
    expect(plan.recommendations).toHaveLength(DEFAULT_IMPROVEMENT_FACTORS.length);
  });

  it('reports an already-held target as achieved', () => {
    const plan = analyzeImprovementDrivers(breakdownFor(80, 70, 90), 'B', options);
    expect(plan.status).toBe('achieved');
    expect(plan.gap).toBe(0);
    expect(plan.plan).toEqual([]);
    expect(plan.projectedTotal).toBe(80);
  });

  it('keeps the top grade as its own target', () => {
    const plan = analyzeImprovementDrivers(breakdownFor(100, 100, 100), undefined, options);
    expect(plan.targetGrade).toBe('A+');
    expect(plan.status).toBe('achieved');
    expect(plan.recommendations.every(r => r.pillarGain === 0)).toBe(true);
  });

  it('marks a target the factors cannot reach as unreachable', () => {
    const factors = loadImprovementFactors([{ name: 'tiny', pillar: 'E', impact: 1, cost: 10, months: 1 }]);
    const plan = analyzeImprovementDrivers(breakdownFor(60, 60, 60), 'A+', { ...options, factors });
    expect(plan).toMatchObject({
      gap: 30,
      status: 'unreachable',
      plan: ['tiny'],
      projectedScores: { E: 61, S: 60, G: 60 },
      projectedTotal: 60.3,
      projectedGrade: 'C',
    });
  });
});

describe('nextGrade', () => {
  it('steps one bucket up and stops at the top', () => {
    expect(nextGrade('C')).toBe('B-');
    expect(nextGrade('B+')).toBe('A-');
    expect(nextGrade('A+')).toBe('A+');
  });
});

describe('loadImprovementFactors', () => {
  function configErrorOf(fn: () => unknown): ConfigurationError {
    try {
      fn();
    } catch (err) {
      if (err instanceof ConfigurationError) return err;
      throw err;
    }
    throw new Error('expected a ConfigurationError');
  }

  it('defaults the description', () => {
    const [factor] = loadImprovementFactors([{ name: 'audit', pillar: 'G', impact: 5, cost: 1, months: 2 }]);
    expect(factor.description).toBe('');
  });

  it('rejects a repeated factor', () => {
    const entry = { name: 'audit', pillar: 'G', impact: 5, cost: 1, months: 2 };
    expect(configErrorOf(() => loadImprovementFactors([entry, entry])).setting).toBe('factors.audit');
  });

  it('rejects a factor without cost', () => {
    const err = configErrorOf(() => loadImprovementFactors([{ name: 'free', pillar: 'E', impact: 5, cost: 0, months: 1 }]));
    expect(err.setting).toBe('factors.0.cost');
  });
});
