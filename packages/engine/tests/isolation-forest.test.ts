import { describe, it, expect } from 'vitest';
import {
  averagePathLength, createRandom, detectSpikes, isolationScores, median,
} from '../insight/isolation-forest.js';

const options = { trees: 100, sampleSize: 256, seed: 42, threshold: 0.6, minSamples: 7 };

function spikeSeries(spike: number, at = 29): number[] {
  const values = new Array<number>(30).fill(10);
  values[at] = spike;
  return values;
}

describe('isolation forest', () => {
  it('computes the average path length normalizer', () => {
    expect(averagePathLength(1)).toBe(0);
    expect(averagePathLength(2)).toBe(1);
    expect(averagePathLength(30)).toBeCloseTo(5.9557, 3);
  });

  it('is deterministic for a seed', () => {
    const a = createRandom(7);
    const b = createRandom(7);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);

    const values = [3, 9, 4, 4, 5, 30, 2, 6, 5, 4];
    expect(isolationScores(values, options)).toEqual(isolationScores(values, options));
  });

  it('scores a constant series at 0.5', () => {
    const scores = isolationScores(new Array<number>(30).fill(10), options);
    expect(new Set(scores)).toEqual(new Set([0.5]));
    expect(detectSpikes(new Array<number>(30).fill(10), options).some(Boolean)).toBe(false);
  });

  it('isolates a single spike', () => {
    const scores = isolationScores(spikeSeries(200), options);
    expect(scores[29]).toBeCloseTo(0.8901, 3);
    expect(scores[0]).toBeCloseTo(0.4486, 3);

    const flags = detectSpikes(spikeSeries(200), options);
    expect(flags.filter(Boolean)).toHaveLength(1);
    expect(flags[29]).toBe(true);
  });

  it('does not flag a quiet day', () => {
    const flags = detectSpikes(spikeSeries(0, 12), options);
    expect(flags.some(Boolean)).toBe(false);
  });

  it('never flags a short series', () => {
    expect(detectSpikes([1, 1, 1, 50], options)).toEqual([false, false, false, false]);
  });

  it('returns no scores for an empty series', () => {
    expect(isolationScores([], options)).toEqual([]);
  });

  it('takes the median of odd and even series', () => {
    expect(median([5, 1, 3])).toBe(3);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });
});
