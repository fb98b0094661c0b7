/**
 * Scaler registry — maps a raw distance d >= 0 into [0, 1] so that features
 * measured in different units become comparable before weighting.
 */

import type { BuiltInScalerKind, ScalerFn, ScalerKind, ScalerRef, ScalerSpec } from '../feature-types.js';
import { DuplicateRegistrationError, UnknownScalerError } from '../space/errors.js';

/** Identity; the raw metric is expected to already lie in [0, 1]. */
export function identity(distance: number): number {
    return distance;
}

/** `min(d / r, 1)`: 0 at d = 0, saturates to 1 from d = r on. */
export function linear(distance: number, range: number): number {
    return Math.min(distance / range, 1);
}

/** `1 - exp(-d / r)`: 0 at d = 0, strictly increasing, asymptotic to 1. */
export function exponential(distance: number, range: number): number {
    return 1 - Math.exp(-distance / range);
}

/** Scaler kinds that need a `range`. */
export const RANGED_SCALERS: readonly ScalerKind[] = ['linear', 'exponential'];

export function requiresRange(kind: ScalerKind): boolean {
    return RANGED_SCALERS.includes(kind);
}

type ScalerFactory = (range: number | undefined) => (distance: number) => number;

const BUILT_IN_SCALERS: Record<BuiltInScalerKind, ScalerFactory> = {
    none: () => identity,
    linear: (range) => (d) => linear(d, range ?? 1),
    exponential: (range) => (d) => exponential(d, range ?? 1),
};

function isBuiltInScaler(kind: string): kind is BuiltInScalerKind {
    return Object.prototype.hasOwnProperty.call(BUILT_IN_SCALERS, kind);
}

export class ScalerRegistry {
    private readonly custom = new Map<string, ScalerFn>();

    /**
     * Registers a caller-supplied scaler under `name`, usable as
     * `{ kind: 'custom', name }`.
     */
    register(name: string, fn: ScalerFn): this {
        if (name.length === 0 || name === 'custom' || isBuiltInScaler(name) || this.custom.has(name)) {
            throw new DuplicateRegistrationError('scaler', name);
        }
        this.custom.set(name, fn);
        return this;
    }

    has(name: string): boolean {
        return isBuiltInScaler(name) || this.custom.has(name);
    }

    names(): string[] {
        return [...Object.keys(BUILT_IN_SCALERS), ...this.custom.keys()];
    }

    /**
     * Binds the scaler to its range. Range validity is checked by the schema
     * builder before this is called.
     */
    resolve(spec: ScalerSpec): ScalerRef {
        const range = spec.range;
        if (spec.kind === 'custom') {
            const fn = spec.impl ?? (spec.name !== undefined ? this.custom.get(spec.name) : undefined);
            if (!fn) {
                throw new UnknownScalerError(spec.name ?? '(unnamed)');
            }
            return Object.freeze({ kind: spec.kind, range, impl: (d: number) => fn(d, range) });
        }
        return Object.freeze({ kind: spec.kind, range, impl: BUILT_IN_SCALERS[spec.kind](range) });
    }
}

export const defaultScalerRegistry = new ScalerRegistry();
