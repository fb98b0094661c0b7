/**
 * Feature schema — builds a validated, immutable FeatureSpace.
 *
 * Checks run in a fixed order over the whole definition list, so the first
 * error reported is deterministic: name uniqueness, dimension, metric
 * compatibility (and params), scaler range (and params), weight, prototype.
 */

import type {
    AggregationSpec,
    Feature,
    FeatureDef,
    FeatureValue,
    MetricParams,
    MetricRef,
    ScalerRef,
} from '../feature-types.js';
import { defaultMetricRegistry, isMetricCompatible, isVector, METRIC_PARAM_KEYS, UNBOUNDED_METRICS } from '../metrics/metrics.js';
import { defaultScalerRegistry, requiresRange } from '../metrics/scalers.js';
import { checkValueShape, defaultPrototype } from './element.js';
import {
    ConfigurationError,
    DuplicateFeatureNameError,
    IncompatibleMetricError,
    InputError,
    InvalidDimensionError,
    InvalidMetricParamsError,
    InvalidPrototypeError,
    InvalidRangeError,
    InvalidScalerParamsError,
    MissingDimensionError,
    NegativeWeightError,
    UnexpectedDimensionError,
} from './errors.js';
import { DEFAULT_DISTRIBUTION_TOLERANCE } from './types.js';
import type { BuildOptions } from './types.js';

const COSINE_TRANSFORMS = ['none', 'complement'];

export class FeatureSpace {
    readonly features: readonly Feature[];
    readonly aggregation: Readonly<AggregationSpec>;
    private readonly byName: ReadonlyMap<string, Feature>;

    private constructor(features: readonly Feature[], aggregation: Readonly<AggregationSpec>) {
        this.features = features;
        this.aggregation = aggregation;
        this.byName = new Map(features.map(f => [f.name, f]));
        Object.freeze(this);
    }

    /**
     * Validates `defs` and returns the frozen space, or throws a ConfigurationError.
     */
    static build(defs: readonly FeatureDef[], aggregation: AggregationSpec, options: BuildOptions = {}): FeatureSpace {
        const logger = options.logger ?? null;
        const metrics = options.metrics ?? defaultMetricRegistry;
        const scalers = options.scalers ?? defaultScalerRegistry;
        const distributionTolerance = options.distributionTolerance ?? DEFAULT_DISTRIBUTION_TOLERANCE;

        if (!isNonNegativeFinite(distributionTolerance)) {
            throw new ConfigurationError(`distributionTolerance must be a finite number >= 0, got ${distributionTolerance}`);
        }
        if (aggregation.norm !== 'L1' && aggregation.norm !== 'L2') {
            throw new ConfigurationError(`Unknown aggregation norm '${String(aggregation.norm)}'`, 'INVALID_AGGREGATION');
        }

        const seen = new Set<string>();
        for (const def of defs) {
            if (seen.has(def.name)) throw new DuplicateFeatureNameError(def.name);
            seen.add(def.name);
        }

        for (const def of defs) {
            if (def.valueType === 'vector') {
                if (def.dimension === undefined) throw new MissingDimensionError(def.name);
                if (!Number.isInteger(def.dimension) || def.dimension <= 0) {
                    throw new InvalidDimensionError(def.name, def.dimension);
                }
            } else if (def.dimension !== undefined) {
                throw new UnexpectedDimensionError(def.name, def.valueType);
            }
        }

        const metricRefs: MetricRef[] = [];
        for (const def of defs) {
            if (!isMetricCompatible(def.metric.kind, def.valueType)) {
                throw new IncompatibleMetricError(def.name, def.metric.kind, def.valueType);
            }
            const params = checkMetricParams(def, distributionTolerance);
            metricRefs.push(metrics.resolve({ ...def.metric, params }));
        }

        const scalerRefs: ScalerRef[] = [];
        for (const def of defs) {
            const { kind, range } = def.scaler;
            if (range === undefined) {
                if (requiresRange(kind)) {
                    throw new InvalidRangeError(def.name, `scaler '${kind}' requires a range`);
                }
            } else if (!Number.isFinite(range) || range <= 0) {
                throw new InvalidRangeError(def.name, `scaler range must be finite and > 0, got ${range}`);
            }
            if (kind !== 'custom' && (def.scaler.name !== undefined || def.scaler.impl !== undefined)) {
                throw new InvalidScalerParamsError(def.name, `scaler '${kind}' takes no name or impl; those are for 'custom'`);
            }
            scalerRefs.push(scalers.resolve(def.scaler));
        }

        for (const def of defs) {
            if (!isNonNegativeFinite(def.weight)) throw new NegativeWeightError(def.name, def.weight);
        }

        const features = defs.map((def, i): Feature => Object.freeze({
            name: def.name,
            valueType: def.valueType,
            dimension: def.dimension,
            metric: metricRefs[i],
            scaler: scalerRefs[i],
            weight: def.weight,
            prototype: def.prototype === undefined ? undefined : checkPrototype(def, def.prototype),
        }));

        for (const f of features) {
            if (f.metric.kind === 'cosine' && f.metric.params.transform === undefined) {
                logger?.warn?.(`[schema] Feature '${f.name}' uses cosine without a transform; raw similarity in [-1, 1] is aggregated as-is`);
            }
            if (f.scaler.kind === 'none' && UNBOUNDED_METRICS.includes(f.metric.kind)) {
                logger?.warn?.(`[schema] Feature '${f.name}' pairs unbounded metric '${f.metric.kind}' with scaler 'none'`);
            }
        }
        logger?.info?.(`[schema] Built feature space: ${features.length} features, norm ${aggregation.norm}`);

        return new FeatureSpace(
            Object.freeze(features),
            Object.freeze({ norm: aggregation.norm, normalizeWeights: aggregation.normalizeWeights ?? false }),
        );
    }

    get size(): number {
        return this.features.length;
    }

    feature(name: string): Feature | undefined {
        return this.byName.get(name);
    }

    names(): string[] {
        return this.features.map(f => f.name);
    }

    /**
     * Returns a fresh element holding each feature's prototype, or the
     * value type's default (0, '', false, zero vector).
     */
    blankElement(): Record<string, FeatureValue> {
        const element: Record<string, FeatureValue> = {};
        for (const f of this.features) {
            const value = f.prototype ?? defaultPrototype(f.valueType, f.dimension);
            element[f.name] = isVector(value) ? [...value] : value;
        }
        return element;
    }
}

function isNonNegativeFinite(value: number): boolean {
    return Number.isFinite(value) && value >= 0;
}

function checkMetricParams(def: FeatureDef, distributionTolerance: number): MetricParams {
    const { kind } = def.metric;
    const params: MetricParams = { ...def.metric.params };
    const allowed: readonly string[] = METRIC_PARAM_KEYS[kind];
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && !allowed.includes(key)) {
            throw new InvalidMetricParamsError(def.name, `metric '${kind}' does not take param '${key}'`);
        }
    }
    if (kind !== 'custom' && def.metric.impl !== undefined) {
        throw new InvalidMetricParamsError(def.name, `metric '${kind}' takes no impl; that is for 'custom'`);
    }
    if (params.tolerance !== undefined && !isNonNegativeFinite(params.tolerance)) {
        throw new InvalidMetricParamsError(def.name, `tolerance must be a finite number >= 0, got ${params.tolerance}`);
    }
    if (params.transform !== undefined && !COSINE_TRANSFORMS.includes(params.transform)) {
        throw new InvalidMetricParamsError(def.name, `unknown cosine transform '${String(params.transform)}'`);
    }
    if (kind === 'hellinger' && params.tolerance === undefined) {
        params.tolerance = distributionTolerance;
    }
    return params;
}

function checkPrototype(def: FeatureDef, prototype: FeatureValue): FeatureValue {
    try {
        const value = checkValueShape(def, prototype);
        return isVector(value) ? Object.freeze([...value]) : value;
    } catch (err) {
        if (err instanceof InputError) throw new InvalidPrototypeError(def.name, err.message);
        throw err;
    }
}
