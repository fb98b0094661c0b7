import type { FeatureValue, ValueType } from '../feature-types.js';
import { describeValue, isVector } from '../metrics/metrics.js';
import { DimensionMismatchError, TypeMismatchError } from './errors.js';

export interface ValueShape {
    name: string;
    valueType: ValueType;
    dimension?: number;
}

/**
 * Checks that `value` has the runtime shape declared by `shape` and returns it narrowed.
 * Categorical values may be strings or finite numbers (enum codes).
 */
export function checkValueShape(shape: ValueShape, value: FeatureValue): FeatureValue {
    const { name, valueType } = shape;

    if (valueType === 'vector') {
        if (!isVector(value)) {
            throw new TypeMismatchError(`Feature '${name}' expects a vector, got ${describeValue(value)}`, name);
        }
        const expected = shape.dimension ?? value.length;
        if (value.length !== expected) {
            throw new DimensionMismatchError(expected, value.length, name);
        }
        for (const v of value) {
            if (typeof v !== 'number' || !Number.isFinite(v)) {
                throw new TypeMismatchError(`Feature '${name}' expects finite vector entries, got ${String(v)}`, name);
            }
        }
        return value;
    }

    const ok =
        valueType === 'real_scalar' ? typeof value === 'number' && Number.isFinite(value)
            : valueType === 'int_scalar' ? typeof value === 'number' && Number.isInteger(value)
                : valueType === 'boolean' ? typeof value === 'boolean'
                    : typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));

    if (!ok) {
        const got = isVector(value) ? describeValue(value) : `${typeof value} ${String(value)}`;
        throw new TypeMismatchError(`Feature '${name}' expects ${valueType}, got ${got}`, name);
    }
    return value;
}

/** Value used for a feature with no declared prototype. */
export function defaultPrototype(valueType: ValueType, dimension: number | undefined): FeatureValue {
    switch (valueType) {
        case 'real_scalar':
        case 'int_scalar':
            return 0;
        case 'categorical':
            return '';
        case 'boolean':
            return false;
        case 'vector':
            return new Array<number>(dimension ?? 0).fill(0);
    }
}
