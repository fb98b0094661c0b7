import type { AggregationSpec, WeightedDistance } from '../feature-types.js';

/**
 * Combines scaled per-feature distances into one scalar.
 *
 * - L1: `sum(w_i * d_i)`
 * - L2: `sqrt(sum(w_i * d_i^2))`
 *
 * With `normalizeWeights`, the sum (the radicand for L2) is divided by `sum(w_i)`.
 * An empty sequence, or one whose weights are all zero, yields 0.
 */
export function aggregate(spec: AggregationSpec, entries: readonly WeightedDistance[]): number {
    let sum = 0;
    let weightSum = 0;
    for (const { weight, value } of entries) {
        sum += spec.norm === 'L2' ? weight * value * value : weight * value;
        weightSum += weight;
    }

    if (spec.normalizeWeights) {
        sum = weightSum > 0 ? sum / weightSum : 0;
    }

    return spec.norm === 'L2' ? Math.sqrt(sum) : sum;
}
