/**
 * Feature Space Types - Core type definitions
 *
 * @module feature-distance
 *
 * A feature space is an ordered list of named, typed features. Each feature
 * binds a metric (raw per-feature distance), a scaler (maps the raw distance
 * into [0, 1]) and a weight used by the aggregation norm.
 */

export const FEATURE_DISTANCE_VERSION = '1.0.0';

// ============================================================================
// Values
// ============================================================================

/**
 * Declared value type of a feature.
 */
export type ValueType = 'real_scalar' | 'int_scalar' | 'categorical' | 'boolean' | 'vector';

export const VALUE_TYPES: readonly ValueType[] = ['real_scalar', 'int_scalar', 'categorical', 'boolean', 'vector'];

export type ScalarValue = number | string | boolean;
export type VectorValue = readonly number[];
export type FeatureValue = ScalarValue | VectorValue;

/**
 * One concrete instance of a feature space: feature name -> value.
 * Never mutated by the engine.
 */
export type Element = Readonly<Record<string, FeatureValue | undefined>>;

// ============================================================================
// Metrics
// ============================================================================

export type BuiltInMetricKind =
    | 'discrete'
    | 'absolute'
    | 'euclidean'
    | 'manhattan'
    | 'chebyshev'
    | 'cosine'
    | 'hellinger';

export type MetricKind = BuiltInMetricKind | 'custom';

export const METRIC_KINDS: readonly MetricKind[] = [
    'discrete', 'absolute', 'euclidean', 'manhattan', 'chebyshev', 'cosine', 'hellinger', 'custom',
];

/**
 * Sign convention applied to the cosine similarity.
 * - `none`: raw similarity in [-1, 1] (larger = more similar)
 * - `complement`: `1 - similarity`, a distance in [0, 2]
 */
export type CosineTransform = 'none' | 'complement';

export interface MetricParams {
    /** Equality tolerance for `discrete` on numeric values, or sum tolerance for `hellinger`. */
    tolerance?: number;
    /** `hellinger` only: divide each vector by its sum before comparing. */
    normalize?: boolean;
    /** `cosine` only. */
    transform?: CosineTransform;
    /** `custom` only: name of a function registered in a MetricRegistry. */
    name?: string;
}

/** Per-feature distance between two values of the same feature. */
export type MetricFn = (a: FeatureValue, b: FeatureValue) => number;

/** Metric as declared by the caller, before registry resolution. */
export interface MetricSpec {
    kind: MetricKind;
    params?: MetricParams;
    /** `custom` only: function used directly instead of a registry lookup. */
    impl?: MetricFn;
}

/** Metric after resolution: the implementation is bound to its params. */
export interface MetricRef {
    readonly kind: MetricKind;
    readonly params: Readonly<MetricParams>;
    readonly impl: MetricFn;
}

// ============================================================================
// Scalers
// ============================================================================

export type BuiltInScalerKind = 'none' | 'linear' | 'exponential';
export type ScalerKind = BuiltInScalerKind | 'custom';

export const SCALER_KINDS: readonly ScalerKind[] = ['none', 'linear', 'exponential', 'custom'];

/** Maps a raw distance (and the feature's range, when it has one) into [0, 1]. */
export type ScalerFn = (distance: number, range: number | undefined) => number;

export interface ScalerSpec {
    kind: ScalerKind;
    /** Required for `linear` and `exponential`; must be finite and > 0 wherever present. */
    range?: number;
    /** `custom` only: name of a function registered in a ScalerRegistry. */
    name?: string;
    /** `custom` only: function used directly instead of a registry lookup. */
    impl?: ScalerFn;
}

export interface ScalerRef {
    readonly kind: ScalerKind;
    readonly range: number | undefined;
    readonly impl: (distance: number) => number;
}

// ============================================================================
// Features and aggregation
// ============================================================================

/**
 * Feature definition as supplied to FeatureSpace.build().
 */
export interface FeatureDef {
    /** Unique within the space; used as key in elements */
    name: string;
    valueType: ValueType;
    /** Required iff valueType is `vector` */
    dimension?: number;
    metric: MetricSpec;
    scaler: ScalerSpec;
    /** >= 0; a zero weight contributes nothing */
    weight: number;
    /** Value used by FeatureSpace.blankElement(). Defaults per value type. */
    prototype?: FeatureValue;
}

/**
 * Validated, frozen feature.
 */
export interface Feature {
    readonly name: string;
    readonly valueType: ValueType;
    readonly dimension: number | undefined;
    readonly metric: MetricRef;
    readonly scaler: ScalerRef;
    readonly weight: number;
    readonly prototype: FeatureValue | undefined;
}

export type AggregationNorm = 'L1' | 'L2';

export interface AggregationSpec {
    norm: AggregationNorm;
    /** Divide by the sum of weights before taking the norm (default false). */
    normalizeWeights?: boolean;
}

/** (weight, scaled distance) pair fed to the aggregator. */
export interface WeightedDistance {
    weight: number;
    value: number;
}

// ============================================================================
// Results
// ============================================================================

export interface FeatureContribution {
    featureName: string;
    /** Metric output before scaling */
    raw: number;
    /** Scaler output, in [0, 1] */
    scaled: number;
    weight: number;
    /** weight * scaled */
    weighted: number;
}

export interface DistanceBreakdown {
    distance: number;
    /** One record per feature, in schema order */
    features: FeatureContribution[];
}
