import { ScalerRegistry, exponential, identity, linear, requiresRange } from '../src/metrics/scalers.js';
import { DuplicateRegistrationError, UnknownScalerError } from '../src/space/errors.js';

describe('linear', () => {
    it('maps 0 to 0 and saturates at the range', () => {
        for (const r of [0.5, 1, 5, 1000]) {
            expect(linear(0, r)).toBe(0);
            expect(linear(r, r)).toBe(1);
            expect(linear(2 * r, r)).toBe(1);
        }
        expect(linear(3, 5)).toBe(0.6);
    });
});

describe('exponential', () => {
    it('maps 0 to 0', () => {
        expect(exponential(0, 1)).toBe(0);
        expect(exponential(0, 1000)).toBe(0);
    });

    it('is strictly increasing and stays below 1', () => {
        let previous = exponential(0, 10);
        for (let d = 1; d <= 100; d++) {
            const current = exponential(d, 10);
            expect(current).toBeGreaterThan(previous);
            expect(current).toBeLessThan(1);
            previous = current;
        }
    });

    it('matches 1 - e^(-d/r)', () => {
        expect(exponential(200, 1000)).toBeCloseTo(1 - Math.exp(-0.2), 12);
        expect(exponential(200, 1000)).toBeCloseTo(0.1813, 4);
    });
});

describe('identity', () => {
    it('returns its input', () => {
        expect(identity(0.42)).toBe(0.42);
    });
});

describe('ScalerRegistry', () => {
    it('binds built-in scalers to their range', () => {
        const registry = new ScalerRegistry();
        const ref = registry.resolve({ kind: 'linear', range: 4 });
        expect(ref.range).toBe(4);
        expect(ref.impl(1)).toBe(0.25);
        expect(registry.resolve({ kind: 'none' }).impl(0.3)).toBe(0.3);
    });

    it('passes the range to custom scalers', () => {
        const registry = new ScalerRegistry().register('half-range', (d, r) => Math.min(d / (2 * (r ?? 1)), 1));
        const ref = registry.resolve({ kind: 'custom', name: 'half-range', range: 5 });
        expect(ref.impl(5)).toBe(0.5);
        expect(registry.resolve({ kind: 'custom', name: 'half-range' }).impl(1)).toBe(0.5);
    });

    it('accepts a directly supplied implementation', () => {
        const ref = new ScalerRegistry().resolve({ kind: 'custom', impl: (d) => d / (1 + d) });
        expect(ref.impl(1)).toBe(0.5);
    });

    it('fails on an unknown custom name', () => {
        expect(() => new ScalerRegistry().resolve({ kind: 'custom', name: 'missing' })).toThrow(UnknownScalerError);
    });

    it('rejects reserved and duplicate names', () => {
        const registry = new ScalerRegistry().register('mine', (d) => d);
        expect(() => registry.register('mine', (d) => d)).toThrow(DuplicateRegistrationError);
        expect(() => registry.register('linear', (d) => d)).toThrow(DuplicateRegistrationError);
    });

    it('knows which kinds need a range', () => {
        expect(requiresRange('linear')).toBe(true);
        expect(requiresRange('exponential')).toBe(true);
        expect(requiresRange('none')).toBe(false);
        expect(requiresRange('custom')).toBe(false);
    });
});
