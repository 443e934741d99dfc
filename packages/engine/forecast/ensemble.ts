// Bagged regression forest. Each member is a CART tree grown on a bootstrap
// sample; the spread of member predictions is the ensemble's uncertainty.

import { Prng } from './prng.js';
import { growTree, predictTree, type TreeNode } from './regression-tree.js';
import { mean, populationVariance } from '../utils/stats.js';

export interface ForestOptions {
  trees: number;
  maxDepth: number;
  seed: number;
  minSamplesLeaf?: number;
}

export interface EnsemblePrediction {
  mean: number;
  variance: number;                // across members
}

export class RandomForestRegressor {
  private constructor(
    private readonly members: readonly TreeNode[],
    readonly trainingSize: number,
  ) {}

  /** Grow `trees` members on bootstrap resamples of (X, y). */
  static fit(X: readonly (readonly number[])[], y: readonly number[], options: ForestOptions): RandomForestRegressor {
    if (X.length === 0 || X.length !== y.length) {
      throw new RangeError(`Forest needs matching non-empty X and y (got ${X.length} and ${y.length})`);
    }

    const rng = new Prng(options.seed);
    const n = X.length;
    const members: TreeNode[] = [];

    for (let t = 0; t < options.trees; t++) {
      const sample: number[] = [];
      for (let k = 0; k < n; k++) sample.push(rng.nextInt(n));
      members.push(growTree(X, y, sample, {
        maxDepth: options.maxDepth,
        minSamplesLeaf: options.minSamplesLeaf ?? 1,
      }));
    }

    return new RandomForestRegressor(Object.freeze(members), n);
  }

  predict(x: readonly number[]): EnsemblePrediction {
    const outputs = this.members.map(tree => predictTree(tree, x));
    return { mean: mean(outputs), variance: populationVariance(outputs) };
  }

  get size(): number {
    return this.members.length;
  }
}
