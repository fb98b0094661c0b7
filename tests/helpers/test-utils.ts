import type { FeatureDef } from '../../src/feature-types.js';
import type { DistanceLogger } from '../../src/space/types.js';
import { FeatureSpace } from '../../src/space/schema.js';

export function scalarFeature(name: string, overrides: Partial<FeatureDef> = {}): FeatureDef {
    return {
        name,
        valueType: 'real_scalar',
        metric: { kind: 'absolute' },
        scaler: { kind: 'linear', range: 10 },
        weight: 1,
        ...overrides,
    };
}

export function vectorFeature(name: string, dimension: number, overrides: Partial<FeatureDef> = {}): FeatureDef {
    return {
        name,
        valueType: 'vector',
        dimension,
        metric: { kind: 'euclidean' },
        scaler: { kind: 'exponential', range: 1 },
        weight: 1,
        ...overrides,
    };
}

/**
 * population (exponential, r=1000, w=0.3), income_distribution (hellinger, w=0.5),
 * coffee_shops (linear, r=5, w=0.2), L1.
 */
export function neighborhoodSpace(): FeatureSpace {
    return FeatureSpace.build([
        scalarFeature('population', { scaler: { kind: 'exponential', range: 1000 }, weight: 0.3 }),
        vectorFeature('income_distribution', 3, { metric: { kind: 'hellinger' }, scaler: { kind: 'none' }, weight: 0.5 }),
        scalarFeature('coffee_shops', { valueType: 'int_scalar', scaler: { kind: 'linear', range: 5 }, weight: 0.2 }),
    ], { norm: 'L1' });
}

export interface RecordingLogger extends DistanceLogger {
    lines: Array<{ level: 'info' | 'warn' | 'error'; msg: string }>;
}

export function recordingLogger(): RecordingLogger {
    const lines: RecordingLogger['lines'] = [];
    return {
        lines,
        info: (msg) => { lines.push({ level: 'info', msg }); },
        warn: (msg) => { lines.push({ level: 'warn', msg }); },
        error: (msg) => { lines.push({ level: 'error', msg }); },
    };
}
