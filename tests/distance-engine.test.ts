import { DistanceEngine, compute, computeBreakdown } from '../src/distance/engine.js';
import { FeatureSpace } from '../src/space/schema.js';
import type { Element } from '../src/feature-types.js';
import {
    DegenerateInputError,
    DimensionMismatchError,
    InputError,
    InvalidDistributionError,
    InvalidMetricOutputError,
    InvalidScalerOutputError,
    MissingFeatureError,
    TypeMismatchError,
} from '../src/space/errors.js';
import { neighborhoodSpace, recordingLogger, scalarFeature, vectorFeature } from './helpers/test-utils.js';

const X = { population: 1000, income_distribution: [0.2, 0.3, 0.5], coffee_shops: 3 };
const Y = { population: 1200, income_distribution: [0.25, 0.25, 0.5], coffee_shops: 6 };

function expectInputError(fn: () => unknown, type: new (...args: never[]) => InputError, featureName: string): void {
    let caught: unknown;
    try {
        fn();
    } catch (err) {
        caught = err;
    }
    expect(caught).toBeInstanceOf(type);
    expect(caught).toHaveProperty('featureName', featureName);
}

describe('DistanceEngine — neighbourhood example', () => {
    const space = neighborhoodSpace();
    const engine = new DistanceEngine(space);

    it('matches direct substitution into the formulas', () => {
        const hellinger = Math.sqrt(1 - (Math.sqrt(0.2 * 0.25) + Math.sqrt(0.3 * 0.25) + Math.sqrt(0.5 * 0.5)));
        const expected = 0.3 * (1 - Math.exp(-0.2)) + 0.5 * hellinger + 0.2 * 0.6;

        expect(engine.compute(X, Y)).toBeCloseTo(expected, 12);
        expect(engine.compute(X, Y)).toBeCloseTo(0.19954, 5);
    });

    it('reports every feature in schema order', () => {
        const { distance, features } = engine.computeBreakdown(X, Y);

        expect(features.map(f => f.featureName)).toEqual(['population', 'income_distribution', 'coffee_shops']);

        expect(features[0].raw).toBe(200);
        expect(features[0].scaled).toBeCloseTo(0.1813, 4);
        expect(features[0].weight).toBe(0.3);
        expect(features[0].weighted).toBeCloseTo(0.3 * (1 - Math.exp(-0.2)), 12);

        expect(features[1].raw).toBeCloseTo(0.0503182, 6);
        expect(features[1].scaled).toBe(features[1].raw);

        expect(features[2].raw).toBe(3);
        expect(features[2].scaled).toBe(0.6);
        expect(features[2].weighted).toBeCloseTo(0.12, 12);

        expect(distance).toBeCloseTo(features.reduce((sum, f) => sum + f.weighted, 0), 12);
    });

    it('is symmetric', () => {
        expect(engine.compute(Y, X)).toBeCloseTo(engine.compute(X, Y), 12);
    });

    it('gives 0 for an element compared with itself', () => {
        expect(engine.compute(X, X)).toBe(0);
        expect(engine.compute(Y, Y)).toBe(0);
    });

    it('does not mutate the elements', () => {
        const x = Object.freeze({ ...X, income_distribution: Object.freeze([0.2, 0.3, 0.5]) });
        const y = Object.freeze({ ...Y, income_distribution: Object.freeze([0.25, 0.25, 0.5]) });
        expect(() => engine.compute(x, y)).not.toThrow();
        expect(x.income_distribution).toEqual([0.2, 0.3, 0.5]);
    });

    it('exposes the same results through the free functions', () => {
        expect(compute(space, X, Y)).toBe(engine.compute(X, Y));
        expect(computeBreakdown(space, X, Y)).toEqual(engine.computeBreakdown(X, Y));
    });
});

describe('DistanceEngine — properties', () => {
    const mixed = FeatureSpace.build([
        scalarFeature('age', { valueType: 'int_scalar', scaler: { kind: 'linear', range: 50 }, weight: 0.2 }),
        scalarFeature('town', { valueType: 'categorical', metric: { kind: 'discrete' }, scaler: { kind: 'none' }, weight: 0.3 }),
        scalarFeature('coastal', { valueType: 'boolean', metric: { kind: 'discrete' }, scaler: { kind: 'none' }, weight: 0.1 }),
        vectorFeature('location', 2, { metric: { kind: 'manhattan' }, scaler: { kind: 'exponential', range: 10 }, weight: 0.25 }),
        vectorFeature('profile', 3, {
            metric: { kind: 'cosine', params: { transform: 'complement' } },
            scaler: { kind: 'linear', range: 2 },
            weight: 0.15,
        }),
    ], { norm: 'L2' });

    const a: Element = { age: 34, town: 'Harbor', coastal: true, location: [1, 2], profile: [0.1, 0.7, 0.2] };
    const b: Element = { age: 59, town: 'Hillside', coastal: false, location: [4, -2], profile: [0.6, 0.1, 0.3] };

    it('gives 0 for identical elements', () => {
        expect(new DistanceEngine(mixed).compute(a, a)).toBe(0);
        expect(new DistanceEngine(mixed).compute(b, b)).toBe(0);
        const scaledUp: Element = { ...b, profile: [3, 5, 7] };
        expect(new DistanceEngine(mixed).compute(scaledUp, scaledUp)).toBe(0);
    });

    it('gives 0 for a distribution compared with itself', () => {
        const space = FeatureSpace.build([
            vectorFeature('bins', 10, { metric: { kind: 'hellinger' }, scaler: { kind: 'none' } }),
        ], { norm: 'L1' });
        const bins = Array<number>(10).fill(0.1);
        expect(new DistanceEngine(space).compute({ bins }, { bins: [...bins] })).toBe(0);
    });

    it('takes the L2 norm of the weighted scaled distances', () => {
        const { distance, features } = new DistanceEngine(mixed).computeBreakdown(a, b);
        const radicand = features.reduce((sum, f) => sum + f.weight * f.scaled * f.scaled, 0);
        expect(distance).toBeCloseTo(Math.sqrt(radicand), 12);
        expect(features[0].scaled).toBe(0.5);
        expect(features[1].raw).toBe(1);
        expect(features[2].raw).toBe(1);
        expect(features[3].raw).toBe(7);
    });

    it('ignores changes to a zero-weight feature', () => {
        const space = FeatureSpace.build([
            scalarFeature('kept', { weight: 1 }),
            scalarFeature('ignored', { weight: 0 }),
        ], { norm: 'L1' });
        const engine = new DistanceEngine(space);
        const base = engine.compute({ kept: 1, ignored: 0 }, { kept: 4, ignored: 0 });
        expect(engine.compute({ kept: 1, ignored: 0 }, { kept: 4, ignored: 9 })).toBe(base);
        expect(base).toBeCloseTo(0.3, 12);
    });

    it('computes 0 for an empty space', () => {
        const empty = FeatureSpace.build([], { norm: 'L2' });
        expect(new DistanceEngine(empty).compute({}, {})).toBe(0);
    });

    it('normalizes by the weight sum when configured', () => {
        const space = FeatureSpace.build([
            scalarFeature('a', { weight: 2 }),
            scalarFeature('b', { weight: 2 }),
        ], { norm: 'L1', normalizeWeights: true });
        expect(new DistanceEngine(space).compute({ a: 0, b: 0 }, { a: 10, b: 0 })).toBe(0.5);
    });
});

describe('DistanceEngine — input errors', () => {
    const engine = new DistanceEngine(neighborhoodSpace());

    it('fails when a feature is missing from either element', () => {
        const { coffee_shops: _omitted, ...partial } = Y;
        expect(() => engine.compute(X, partial)).toThrow(MissingFeatureError);
        expect(() => engine.compute(partial, X)).toThrow("Element x has no value for feature 'coffee_shops'");
        expectInputError(() => engine.compute(X, { ...Y, population: undefined }), MissingFeatureError, 'population');
    });

    it('fails on a value of the wrong type', () => {
        expectInputError(() => engine.compute(X, { ...Y, population: 'many' }), TypeMismatchError, 'population');
        expectInputError(() => engine.compute(X, { ...Y, coffee_shops: 2.5 }), TypeMismatchError, 'coffee_shops');
        expectInputError(() => engine.compute(X, { ...Y, income_distribution: 0.5 }), TypeMismatchError, 'income_distribution');
    });

    it('fails on a vector of the wrong length', () => {
        expectInputError(
            () => engine.compute(X, { ...Y, income_distribution: [0.5, 0.5] }),
            DimensionMismatchError,
            'income_distribution',
        );
    });

    it('fails on a vector that is not a distribution', () => {
        expectInputError(
            () => engine.compute(X, { ...Y, income_distribution: [0.5, 0.6, 0.2] }),
            InvalidDistributionError,
            'income_distribution',
        );
    });

    it('fails on a zero vector under cosine', () => {
        const space = FeatureSpace.build([
            vectorFeature('dir', 2, { metric: { kind: 'cosine', params: { transform: 'complement' } }, scaler: { kind: 'linear', range: 2 } }),
        ], { norm: 'L1' });
        expectInputError(() => new DistanceEngine(space).compute({ dir: [0, 0] }, { dir: [1, 0] }), DegenerateInputError, 'dir');
    });

    it('logs the failing feature before rethrowing', () => {
        const logger = recordingLogger();
        const logged = new DistanceEngine(neighborhoodSpace(), { logger });
        expect(() => logged.compute(X, { ...Y, population: 'many' })).toThrow(TypeMismatchError);
        expect(logger.lines).toEqual([
            {
                level: 'error',
                msg: "[engine] Feature 'population' failed: TypeMismatchError: Feature 'population' expects real_scalar, got string many",
            },
        ]);
    });
});

describe('DistanceEngine — extension contracts', () => {
    it('rejects negative or non-finite custom metric output', () => {
        for (const bad of [-0.5, NaN, Infinity]) {
            const space = FeatureSpace.build([
                scalarFeature('s', { metric: { kind: 'custom', impl: () => bad }, scaler: { kind: 'none' } }),
            ], { norm: 'L1' });
            expect(() => new DistanceEngine(space).compute({ s: 1 }, { s: 2 })).toThrow(InvalidMetricOutputError);
        }
    });

    it('rejects custom scaler output outside [0, 1]', () => {
        const space = FeatureSpace.build([
            scalarFeature('s', { scaler: { kind: 'custom', impl: (d) => d * 2 } }),
        ], { norm: 'L1' });
        const engine = new DistanceEngine(space);
        expect(engine.compute({ s: 0 }, { s: 0.25 })).toBe(0.5);
        expect(() => engine.compute({ s: 0 }, { s: 1 })).toThrow(InvalidScalerOutputError);
    });

    it('rejects a raw distance above 1 under the identity scaler', () => {
        const space = FeatureSpace.build([scalarFeature('s', { scaler: { kind: 'none' } })], { norm: 'L1' });
        expect(() => new DistanceEngine(space).compute({ s: 0 }, { s: 5 })).toThrow(InvalidScalerOutputError);
    });

    it('does not invert a negative cosine similarity on its own', () => {
        const space = FeatureSpace.build([
            vectorFeature('dir', 2, { metric: { kind: 'cosine' }, scaler: { kind: 'none' } }),
        ], { norm: 'L1' });
        const engine = new DistanceEngine(space);
        expect(engine.compute({ dir: [1, 0] }, { dir: [1, 0] })).toBe(1);
        expect(() => engine.compute({ dir: [1, 0] }, { dir: [-1, 0] })).toThrow(InvalidScalerOutputError);
    });
});
