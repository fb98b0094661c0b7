/**
 * FeatureSpaceConfig — the declarative form of a feature space, as handed over
 * by an external loader (JSON, YAML, a database row...).
 *
 * The zod schema checks structure and enums only. Value constraints (weight >= 0,
 * range > 0, dimension rules, metric compatibility) are left to
 * FeatureSpace.build() so they surface as the same ConfigurationError classes
 * whether the space comes from config or from code.
 */

import { z } from 'zod';
import type { FeatureDef, MetricKind, ScalerKind, ValueType } from '../feature-types.js';
import { InvalidConfigError } from './errors.js';
import { FeatureSpace } from './schema.js';
import type { BuildOptions } from './types.js';

const valueTypes = ['real_scalar', 'int_scalar', 'categorical', 'boolean', 'vector'] as const satisfies readonly ValueType[];
const metricKinds = [
    'discrete', 'absolute', 'euclidean', 'manhattan', 'chebyshev', 'cosine', 'hellinger', 'custom',
] as const satisfies readonly MetricKind[];
const scalerKinds = ['none', 'linear', 'exponential', 'custom'] as const satisfies readonly ScalerKind[];

const metricConfigSchema = z.object({
    kind: z.enum(metricKinds),
    params: z.object({
        tolerance: z.number().optional(),
        normalize: z.boolean().optional(),
        transform: z.enum(['none', 'complement']).optional(),
        name: z.string().min(1).optional(),
    }).strict().optional(),
}).strict();

const scalerConfigSchema = z.object({
    kind: z.enum(scalerKinds),
    range: z.number().optional(),
    name: z.string().min(1).optional(),
}).strict();

const featureConfigSchema = z.object({
    name: z.string().min(1),
    value_type: z.enum(valueTypes),
    dimension: z.number().optional(),
    metric: metricConfigSchema,
    scaler: scalerConfigSchema,
    weight: z.number(),
    prototype: z.union([z.number(), z.string(), z.boolean(), z.array(z.number())]).optional(),
}).strict();

export const featureSpaceConfigSchema = z.object({
    features: z.array(featureConfigSchema),
    aggregation: z.object({
        norm: z.enum(['L1', 'L2']),
        normalize_weights: z.boolean().optional(),
    }).strict(),
}).strict();

export type FeatureConfig = z.infer<typeof featureConfigSchema>;
export type FeatureSpaceConfig = z.infer<typeof featureSpaceConfigSchema>;

/**
 * Validates an untrusted config object. Throws InvalidConfigError listing every issue.
 */
export function parseFeatureSpaceConfig(input: unknown): FeatureSpaceConfig {
    const result = featureSpaceConfigSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidConfigError(
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }
    return result.data;
}

export function toFeatureDefs(config: FeatureSpaceConfig): FeatureDef[] {
    return config.features.map((f): FeatureDef => ({
        name: f.name,
        valueType: f.value_type,
        dimension: f.dimension,
        metric: { kind: f.metric.kind, params: f.metric.params },
        scaler: { kind: f.scaler.kind, range: f.scaler.range, name: f.scaler.name },
        weight: f.weight,
        prototype: f.prototype,
    }));
}

/**
 * Parses `input` and builds the FeatureSpace it describes. Custom metric and
 * scaler kinds are looked up by name in the registries passed in `options`.
 */
export function fromConfig(input: unknown, options: BuildOptions = {}): FeatureSpace {
    const config = parseFeatureSpaceConfig(input);
    return FeatureSpace.build(
        toFeatureDefs(config),
        { norm: config.aggregation.norm, normalizeWeights: config.aggregation.normalize_weights },
        options,
    );
}
