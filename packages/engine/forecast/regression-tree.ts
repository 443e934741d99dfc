// CART regression tree, variance-reduction splits.
// Split search visits features and thresholds in a fixed order and keeps the
// first strictly-best split, so a given sample always yields the same tree.

export type TreeNode =
  | { readonly kind: 'leaf'; readonly value: number; readonly samples: number }
  | {
      readonly kind: 'split';
      readonly feature: number;
      readonly threshold: number;
      readonly left: TreeNode;
      readonly right: TreeNode;
    };

export interface TreeOptions {
  maxDepth: number;
  minSamplesSplit?: number;
  minSamplesLeaf?: number;
}

interface Split {
  feature: number;
  threshold: number;
  sse: number;
}

const MIN_GAIN = 1e-12;

function leafOf(y: readonly number[], indices: readonly number[]): TreeNode {
  let sum = 0;
  for (const i of indices) sum += y[i];
  return { kind: 'leaf', value: sum / indices.length, samples: indices.length };
}

function sumSquaredError(y: readonly number[], indices: readonly number[]): number {
  let sum = 0;
  let sumSq = 0;
  for (const i of indices) {
    sum += y[i];
    sumSq += y[i] * y[i];
  }
  return sumSq - (sum * sum) / indices.length;
}

function bestSplit(
  X: readonly (readonly number[])[],
  y: readonly number[],
  indices: readonly number[],
  minLeaf: number,
): Split | null {
  const nFeatures = X[indices[0]].length;
  let best: Split | null = null;

  for (let f = 0; f < nFeatures; f++) {
    // Columns with missing values in this node are not split on.
    if (indices.some(i => Number.isNaN(X[i][f]))) continue;
    const sorted = [...indices].sort((a, b) => X[a][f] - X[b][f] || a - b);

    let totalSum = 0;
    let totalSq = 0;
    for (const i of sorted) {
      totalSum += y[i];
      totalSq += y[i] * y[i];
    }

    let leftSum = 0;
    let leftSq = 0;
    for (let k = 0; k < sorted.length - 1; k++) {
      const i = sorted[k];
      leftSum += y[i];
      leftSq += y[i] * y[i];

      const leftN = k + 1;
      const rightN = sorted.length - leftN;
      if (leftN < minLeaf || rightN < minLeaf) continue;

      const here = X[i][f];
      const next = X[sorted[k + 1]][f];
      if (here === next) continue;

      const rightSum = totalSum - leftSum;
      const rightSq = totalSq - leftSq;
      const sse = (leftSq - (leftSum * leftSum) / leftN) + (rightSq - (rightSum * rightSum) / rightN);

      if (best === null || sse < best.sse) {
        best = { feature: f, threshold: (here + next) / 2, sse };
      }
    }
  }

  return best;
}

export function growTree(
  X: readonly (readonly number[])[],
  y: readonly number[],
  indices: readonly number[],
  options: TreeOptions,
  depth = 0,
): TreeNode {
  const minSplit = options.minSamplesSplit ?? 2;
  const minLeaf = options.minSamplesLeaf ?? 1;

  if (depth >= options.maxDepth || indices.length < minSplit) return leafOf(y, indices);

  const parentSse = sumSquaredError(y, indices);
  if (parentSse <= MIN_GAIN) return leafOf(y, indices);

  const split = bestSplit(X, y, indices, minLeaf);
  if (split === null || parentSse - split.sse <= MIN_GAIN) return leafOf(y, indices);

  const left = indices.filter(i => X[i][split.feature] <= split.threshold);
  const right = indices.filter(i => X[i][split.feature] > split.threshold);

  return {
    kind: 'split',
    feature: split.feature,
    threshold: split.threshold,
    left: growTree(X, y, left, options, depth + 1),
    right: growTree(X, y, right, options, depth + 1),
  };
}

/** Walk to a leaf. NaN feature values follow the right branch. */
export function predictTree(node: TreeNode, x: readonly number[]): number {
  let current = node;
  while (current.kind === 'split') {
    current = x[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.value;
}
