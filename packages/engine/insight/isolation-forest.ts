// One-dimensional isolation forest over a daily series
// Seeded, so the same series and parameters always produce the same scores.
// Score s = 2^(-E[h(x)] / c(n)): near 1 is anomalous, 0.5 or below is normal.

export interface IsolationForestOptions {
  trees: number;
  sampleSize: number;
  seed: number;
}

export interface AnomalyOptions extends IsolationForestOptions {
  threshold: number;
  /** Series shorter than this are never flagged */
  minSamples: number;
}

type IsolationNode =
  | { kind: 'leaf'; size: number }
  | { kind: 'split'; at: number; left: IsolationNode; right: IsolationNode };

const EULER_GAMMA = 0.5772156649;

/** Average path length of an unsuccessful BST search over n points */
export function averagePathLength(n: number): number {
  if (n <= 1) return 0;
  if (n === 2) return 1;
  return 2 * (Math.log(n - 1) + EULER_GAMMA) - (2 * (n - 1)) / n;
}

/** mulberry32: small, fast, seedable PRNG in [0, 1) */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function buildTree(values: number[], depth: number, heightLimit: number, random: () => number): IsolationNode {
  if (depth >= heightLimit || values.length <= 1) return { kind: 'leaf', size: values.length };
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === max) return { kind: 'leaf', size: values.length };

  const at = min + random() * (max - min);
  return {
    kind: 'split',
    at,
    left: buildTree(values.filter(v => v < at), depth + 1, heightLimit, random),
    right: buildTree(values.filter(v => v >= at), depth + 1, heightLimit, random),
  };
}

function pathLength(node: IsolationNode, value: number, depth: number): number {
  let current = node;
  let d = depth;
  while (current.kind === 'split') {
    current = value < current.at ? current.left : current.right;
    d++;
  }
  return d + averagePathLength(current.size);
}

function subsample(values: readonly number[], size: number, random: () => number): number[] {
  const pool = [...values];
  if (size >= pool.length) return pool;
  // partial Fisher-Yates
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, size);
}

/** Anomaly score per value, in input order */
export function isolationScores(values: readonly number[], options: IsolationForestOptions): number[] {
  if (values.length === 0) return [];
  const random = createRandom(options.seed);
  const psi = Math.min(options.sampleSize, values.length);
  const heightLimit = Math.ceil(Math.log2(Math.max(psi, 2)));
  const normalizer = averagePathLength(psi);

  const forest: IsolationNode[] = [];
  for (let t = 0; t < options.trees; t++) {
    forest.push(buildTree(subsample(values, psi, random), 0, heightLimit, random));
  }

  return values.map(value => {
    if (normalizer === 0) return 0.5;
    let total = 0;
    for (const tree of forest) total += pathLength(tree, value, 0);
    return 2 ** (-(total / forest.length) / normalizer);
  });
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Flags values scoring above the threshold that also lie above the median:
 * unusually high consumption is excluded from the burn rate, quiet days are not.
 */
export function detectSpikes(values: readonly number[], options: AnomalyOptions): boolean[] {
  if (values.length < options.minSamples) return values.map(() => false);
  const scores = isolationScores(values, options);
  const mid = median(values);
  return values.map((value, i) => scores[i] > options.threshold && value > mid);
}
