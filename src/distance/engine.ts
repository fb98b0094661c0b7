/**
 * Distance engine — pairwise distance between two elements of a FeatureSpace.
 *
 * Per feature, in schema order: fetch both values, check their shape, compute
 * the raw metric, scale it, then hand (weight, scaled) to the aggregator.
 * The engine keeps no state between calls; one instance can serve any number
 * of concurrent callers.
 */

import type { DistanceBreakdown, Element, Feature, FeatureContribution, FeatureValue } from '../feature-types.js';
import type { FeatureSpace } from '../space/schema.js';
import type { DistanceEngineOptions, DistanceLogger } from '../space/types.js';
import { checkValueShape } from '../space/element.js';
import {
    InputError,
    InvalidMetricOutputError,
    InvalidScalerOutputError,
    MissingFeatureError,
} from '../space/errors.js';
import { aggregate } from './aggregate.js';

export class DistanceEngine {
    private readonly logger: DistanceLogger | null;

    constructor(readonly space: FeatureSpace, options: DistanceEngineOptions = {}) {
        this.logger = options.logger ?? null;
    }

    /** Aggregated distance between `x` and `y`. */
    compute(x: Element, y: Element): number {
        return this.computeBreakdown(x, y).distance;
    }

    /** Aggregated distance plus one record per feature, in schema order. */
    computeBreakdown(x: Element, y: Element): DistanceBreakdown {
        const features: FeatureContribution[] = [];
        for (const feature of this.space.features) {
            features.push(this.computeFeature(feature, x, y));
        }
        const distance = aggregate(
            this.space.aggregation,
            features.map(c => ({ weight: c.weight, value: c.scaled })),
        );
        return { distance, features };
    }

    private computeFeature(feature: Feature, x: Element, y: Element): FeatureContribution {
        try {
            const a = checkValueShape(feature, fetchValue(x, feature.name, 'x'));
            const b = checkValueShape(feature, fetchValue(y, feature.name, 'y'));

            const raw = feature.metric.impl(a, b);
            if (feature.metric.kind === 'custom' && !(Number.isFinite(raw) && raw >= 0)) {
                throw new InvalidMetricOutputError(feature.name, raw);
            }

            const scaled = feature.scaler.impl(raw);
            if (!(scaled >= 0 && scaled <= 1)) {
                throw new InvalidScalerOutputError(feature.name, scaled, raw);
            }

            return { featureName: feature.name, raw, scaled, weight: feature.weight, weighted: feature.weight * scaled };
        } catch (err) {
            if (err instanceof InputError && err.featureName === undefined) {
                err.featureName = feature.name;
            }
            const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
            this.logger?.error?.(`[engine] Feature '${feature.name}' failed: ${detail}`);
            throw err;
        }
    }
}

function fetchValue(element: Element, name: string, side: 'x' | 'y'): FeatureValue {
    const value = Object.prototype.hasOwnProperty.call(element, name) ? element[name] : undefined;
    if (value === undefined || value === null) {
        throw new MissingFeatureError(name, side);
    }
    return value;
}

/** One-shot `compute` without keeping an engine around. */
export function compute(space: FeatureSpace, x: Element, y: Element): number {
    return new DistanceEngine(space).compute(x, y);
}

export function computeBreakdown(space: FeatureSpace, x: Element, y: Element): DistanceBreakdown {
    return new DistanceEngine(space).computeBreakdown(x, y);
}
