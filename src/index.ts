/**
 * Feature distance public API
 *
 * @module feature-distance
 */

import { FeatureSpace } from './space/schema.js';
import { fromConfig, parseFeatureSpaceConfig } from './space/config.js';
import type { FeatureSpaceConfig } from './space/config.js';
import { DistanceEngine, compute, computeBreakdown } from './distance/engine.js';

export type {
    ValueType,
    ScalarValue,
    VectorValue,
    FeatureValue,
    Element,
    BuiltInMetricKind,
    MetricKind,
    MetricParams,
    MetricFn,
    MetricSpec,
    MetricRef,
    CosineTransform,
    BuiltInScalerKind,
    ScalerKind,
    ScalerFn,
    ScalerSpec,
    ScalerRef,
    FeatureDef,
    Feature,
    AggregationNorm,
    AggregationSpec,
    WeightedDistance,
    FeatureContribution,
    DistanceBreakdown,
} from './feature-types.js';
export { FEATURE_DISTANCE_VERSION, VALUE_TYPES, METRIC_KINDS, SCALER_KINDS } from './feature-types.js';
export type { BuildOptions, DistanceEngineOptions, DistanceLogger as Logger } from './space/types.js';
export { DEFAULT_DISTRIBUTION_TOLERANCE } from './space/types.js';
export type { FeatureConfig, FeatureSpaceConfig } from './space/config.js';
export { featureSpaceConfigSchema, parseFeatureSpaceConfig, toFeatureDefs, fromConfig } from './space/config.js';
export { FeatureSpace } from './space/schema.js';
export { checkValueShape } from './space/element.js';
export {
    MetricRegistry,
    defaultMetricRegistry,
    METRIC_COMPATIBILITY,
    isMetricCompatible,
    discrete,
    absolute,
    euclidean,
    manhattan,
    chebyshev,
    cosineSimilarity,
    hellinger,
} from './metrics/metrics.js';
export type { HellingerOptions } from './metrics/metrics.js';
export { ScalerRegistry, defaultScalerRegistry, identity, linear, exponential } from './metrics/scalers.js';
export { aggregate } from './distance/aggregate.js';
export { DistanceEngine, compute, computeBreakdown } from './distance/engine.js';
export * from './space/errors.js';

/** Predefined example configurations */
const PREDEFINED_SPACES: Record<string, FeatureSpaceConfig> = {
    /** Neighbourhood comparison: head count, income distribution over three brackets, coffee shop count */
    NEIGHBORHOOD: {
        features: [
            {
                name: 'population',
                value_type: 'real_scalar',
                metric: { kind: 'absolute' },
                scaler: { kind: 'exponential', range: 1000 },
                weight: 0.3,
            },
            {
                name: 'income_distribution',
                value_type: 'vector',
                dimension: 3,
                metric: { kind: 'hellinger' },
                scaler: { kind: 'none' },
                weight: 0.5,
            },
            {
                name: 'coffee_shops',
                value_type: 'int_scalar',
                metric: { kind: 'absolute' },
                scaler: { kind: 'linear', range: 5 },
                weight: 0.2,
            },
        ],
        aggregation: { norm: 'L1' },
    },
};

// The FeatureDistance Namespace Object
export const FeatureDistance = {
    /**
     * Validates feature definitions and returns an immutable FeatureSpace.
     */
    build: FeatureSpace.build,

    /**
     * Parses an untrusted FeatureSpaceConfig object and builds the space it describes.
     */
    fromConfig,

    /**
     * Validates a FeatureSpaceConfig object without building it.
     */
    parseConfig: parseFeatureSpaceConfig,

    /**
     * Aggregated distance between two elements.
     */
    compute,

    /**
     * Aggregated distance plus per-feature raw, scaled and weighted values.
     */
    computeBreakdown,

    /**
     * Engine class for repeated comparisons against one space.
     */
    Engine: DistanceEngine,

    /**
     * Predefined example configurations.
     */
    spaces: PREDEFINED_SPACES,
};

export default FeatureDistance;
