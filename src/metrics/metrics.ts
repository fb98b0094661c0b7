/**
 * Metric registry — per-feature raw distance functions.
 *
 * Built-in metrics are pure functions of two same-typed values. The registry
 * maps a metric kind to a factory that binds the feature's params, and holds
 * named caller-supplied functions for the `custom` kind.
 */

import type {
    BuiltInMetricKind,
    FeatureValue,
    MetricFn,
    MetricKind,
    MetricParams,
    MetricRef,
    MetricSpec,
    ScalarValue,
    ValueType,
    VectorValue,
} from '../feature-types.js';
import {
    DegenerateInputError,
    DimensionMismatchError,
    DuplicateRegistrationError,
    InvalidDistributionError,
    TypeMismatchError,
    UnknownMetricError,
} from '../space/errors.js';
import { DEFAULT_DISTRIBUTION_TOLERANCE } from '../space/types.js';

// ============================================================================
// Built-in metrics
// ============================================================================

/**
 * 0 when equal, 1 otherwise. Numbers compare within `tolerance` (exact by default);
 * strings and booleans compare exactly.
 */
export function discrete(a: ScalarValue, b: ScalarValue, tolerance: number = 0): number {
    if (typeof a === 'number' && typeof b === 'number') {
        return Math.abs(a - b) <= tolerance ? 0 : 1;
    }
    return a === b ? 0 : 1;
}

export function absolute(a: number, b: number): number {
    return Math.abs(a - b);
}

export function euclidean(a: VectorValue, b: VectorValue): number {
    assertSameLength(a, b);
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const d = a[i] - b[i];
        sum += d * d;
    }
    return Math.sqrt(sum);
}

export function manhattan(a: VectorValue, b: VectorValue): number {
    assertSameLength(a, b);
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += Math.abs(a[i] - b[i]);
    }
    return sum;
}

/** Largest absolute component difference. */
export function chebyshev(a: VectorValue, b: VectorValue): number {
    assertSameLength(a, b);
    let max = 0;
    for (let i = 0; i < a.length; i++) {
        const d = Math.abs(a[i] - b[i]);
        if (d > max) max = d;
    }
    return max;
}

/**
 * Cosine of the angle between `a` and `b`, in [-1, 1].
 *
 * This is a similarity (larger = more alike), not a distance. A feature using it
 * has to opt into `transform: 'complement'` to get `1 - similarity`.
 */
export function cosineSimilarity(a: VectorValue, b: VectorValue): number {
    assertSameLength(a, b);
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        throw new DegenerateInputError('Cosine similarity is undefined for a zero-length vector');
    }
    // exactly 1 for a = b
    const similarity = dot / Math.sqrt(normA * normB);
    // rounding can push |similarity| slightly past 1
    return Math.max(-1, Math.min(1, similarity));
}

export interface HellingerOptions {
    /** Allowed deviation of each vector's sum from 1. Default 1e-6. */
    tolerance?: number;
    /** Divide each vector by its sum first instead of requiring it to sum to 1. */
    normalize?: boolean;
}

/**
 * Hellinger distance between two discrete distributions over the same bins, in [0, 1].
 */
export function hellinger(a: VectorValue, b: VectorValue, options: HellingerOptions = {}): number {
    assertSameLength(a, b);
    const tolerance = options.tolerance ?? DEFAULT_DISTRIBUTION_TOLERANCE;
    const normalize = options.normalize ?? false;
    const p = toDistribution(a, tolerance, normalize);
    const q = toDistribution(b, tolerance, normalize);

    // equals 1 - sum(sqrt(p * q)) for exact distributions; exactly 0 when p = q
    let sum = 0;
    for (let i = 0; i < p.length; i++) {
        const d = Math.sqrt(p[i]) - Math.sqrt(q[i]);
        sum += d * d;
    }
    return Math.sqrt(Math.min(1, 0.5 * sum));
}

function toDistribution(values: VectorValue, tolerance: number, normalize: boolean): VectorValue {
    let sum = 0;
    for (const v of values) {
        if (!Number.isFinite(v) || v < 0) {
            throw new InvalidDistributionError(`Distribution entries must be finite and >= 0, got ${v}`);
        }
        sum += v;
    }
    if (normalize) {
        if (sum <= 0) {
            throw new InvalidDistributionError('Cannot normalize a distribution whose entries sum to 0');
        }
        return values.map(v => v / sum);
    }
    if (Math.abs(sum - 1) > tolerance) {
        throw new InvalidDistributionError(`Distribution must sum to 1 (tolerance ${tolerance}), got ${sum}`);
    }
    return values;
}

function assertSameLength(a: VectorValue, b: VectorValue): void {
    if (a.length !== b.length) {
        throw new DimensionMismatchError(a.length, b.length);
    }
}

// ============================================================================
// Value narrowing for registry adapters
// ============================================================================

function asNumber(value: FeatureValue): number {
    if (typeof value !== 'number') {
        throw new TypeMismatchError(`Expected a number, got ${describeValue(value)}`);
    }
    return value;
}

export function isVector(value: FeatureValue): value is VectorValue {
    return Array.isArray(value);
}

function asScalar(value: FeatureValue): ScalarValue {
    if (isVector(value)) {
        throw new TypeMismatchError('Expected a scalar value, got a vector');
    }
    return value;
}

function asVector(value: FeatureValue): VectorValue {
    if (!isVector(value)) {
        throw new TypeMismatchError(`Expected a vector, got ${describeValue(value)}`);
    }
    return value;
}

export function describeValue(value: unknown): string {
    if (Array.isArray(value)) return `vector[${value.length}]`;
    if (value === null) return 'null';
    return typeof value;
}

// ============================================================================
// Compatibility
// ============================================================================

/**
 * Built-in metrics allowed per value type. `custom` is accepted for every type.
 */
export const METRIC_COMPATIBILITY: Record<ValueType, readonly BuiltInMetricKind[]> = {
    categorical: ['discrete'],
    boolean: ['discrete'],
    real_scalar: ['discrete', 'absolute'],
    int_scalar: ['discrete', 'absolute'],
    vector: ['euclidean', 'manhattan', 'chebyshev', 'cosine', 'hellinger'],
};

export function isMetricCompatible(kind: MetricKind, valueType: ValueType): boolean {
    if (kind === 'custom') return true;
    return METRIC_COMPATIBILITY[valueType].includes(kind);
}

/** Params each metric kind reads; any other param is a build error. */
export const METRIC_PARAM_KEYS: Record<MetricKind, readonly (keyof MetricParams)[]> = {
    discrete: ['tolerance'],
    absolute: [],
    euclidean: [],
    manhattan: [],
    chebyshev: [],
    cosine: ['transform'],
    hellinger: ['tolerance', 'normalize'],
    custom: ['name'],
};

/** Metrics whose output is not bounded above. */
export const UNBOUNDED_METRICS: readonly MetricKind[] = ['absolute', 'euclidean', 'manhattan', 'chebyshev'];

// ============================================================================
// Registry
// ============================================================================

type MetricFactory = (params: Readonly<MetricParams>) => MetricFn;

const BUILT_IN_METRICS: Record<BuiltInMetricKind, MetricFactory> = {
    discrete: (params) => {
        const tolerance = params.tolerance ?? 0;
        return (a, b) => discrete(asScalar(a), asScalar(b), tolerance);
    },
    absolute: () => (a, b) => absolute(asNumber(a), asNumber(b)),
    euclidean: () => (a, b) => euclidean(asVector(a), asVector(b)),
    manhattan: () => (a, b) => manhattan(asVector(a), asVector(b)),
    chebyshev: () => (a, b) => chebyshev(asVector(a), asVector(b)),
    cosine: (params) => {
        const complement = params.transform === 'complement';
        return (a, b) => {
            const similarity = cosineSimilarity(asVector(a), asVector(b));
            return complement ? 1 - similarity : similarity;
        };
    },
    hellinger: (params) => {
        const options: HellingerOptions = { tolerance: params.tolerance, normalize: params.normalize };
        return (a, b) => hellinger(asVector(a), asVector(b), options);
    },
};

function isBuiltInMetric(kind: string): kind is BuiltInMetricKind {
    return Object.prototype.hasOwnProperty.call(BUILT_IN_METRICS, kind);
}

export class MetricRegistry {
    private readonly custom = new Map<string, MetricFn>();

    /**
     * Registers a caller-supplied metric under `name`, usable as
     * `{ kind: 'custom', params: { name } }`.
     */
    register(name: string, fn: MetricFn): this {
        if (name.length === 0 || name === 'custom' || isBuiltInMetric(name) || this.custom.has(name)) {
            throw new DuplicateRegistrationError('metric', name);
        }
        this.custom.set(name, fn);
        return this;
    }

    has(name: string): boolean {
        return isBuiltInMetric(name) || this.custom.has(name);
    }

    names(): string[] {
        return [...Object.keys(BUILT_IN_METRICS), ...this.custom.keys()];
    }

    resolve(spec: MetricSpec): MetricRef {
        const params: Readonly<MetricParams> = Object.freeze({ ...spec.params });
        if (spec.kind === 'custom') {
            const impl = spec.impl ?? (params.name !== undefined ? this.custom.get(params.name) : undefined);
            if (!impl) {
                throw new UnknownMetricError(params.name ?? '(unnamed)');
            }
            return Object.freeze({ kind: spec.kind, params, impl });
        }
        return Object.freeze({ kind: spec.kind, params, impl: BUILT_IN_METRICS[spec.kind](params) });
    }
}

export const defaultMetricRegistry = new MetricRegistry();
