export class FeatureSpaceError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'FeatureSpaceError';
    }
}

// ============================================================================
// Configuration errors (raised while building a FeatureSpace)
// ============================================================================

export class ConfigurationError extends FeatureSpaceError {
    constructor(message: string, code: string = 'CONFIGURATION') {
        super(message, code);
        this.name = 'ConfigurationError';
    }
}

export class DuplicateFeatureNameError extends ConfigurationError {
    constructor(public readonly featureName: string) {
        super(`Duplicate feature name '${featureName}'`, 'DUPLICATE_FEATURE_NAME');
        this.name = 'DuplicateFeatureNameError';
    }
}

export class MissingDimensionError extends ConfigurationError {
    constructor(public readonly featureName: string) {
        super(`Vector feature '${featureName}' requires a dimension`, 'MISSING_DIMENSION');
        this.name = 'MissingDimensionError';
    }
}

export class UnexpectedDimensionError extends ConfigurationError {
    constructor(public readonly featureName: string, valueType: string) {
        super(`Feature '${featureName}' of type ${valueType} must not declare a dimension`, 'UNEXPECTED_DIMENSION');
        this.name = 'UnexpectedDimensionError';
    }
}

export class InvalidDimensionError extends ConfigurationError {
    constructor(public readonly featureName: string, dimension: number) {
        super(`Feature '${featureName}' dimension must be a positive integer, got ${dimension}`, 'INVALID_DIMENSION');
        this.name = 'InvalidDimensionError';
    }
}

export class IncompatibleMetricError extends ConfigurationError {
    constructor(public readonly featureName: string, metric: string, valueType: string) {
        super(`Metric '${metric}' cannot be used with ${valueType} feature '${featureName}'`, 'INCOMPATIBLE_METRIC');
        this.name = 'IncompatibleMetricError';
    }
}

export class InvalidRangeError extends ConfigurationError {
    constructor(public readonly featureName: string, message: string) {
        super(`Feature '${featureName}': ${message}`, 'INVALID_RANGE');
        this.name = 'InvalidRangeError';
    }
}

export class NegativeWeightError extends ConfigurationError {
    constructor(public readonly featureName: string, weight: number) {
        super(`Feature '${featureName}' weight must be a finite number >= 0, got ${weight}`, 'NEGATIVE_WEIGHT');
        this.name = 'NegativeWeightError';
    }
}

export class InvalidMetricParamsError extends ConfigurationError {
    constructor(public readonly featureName: string, message: string) {
        super(`Feature '${featureName}': ${message}`, 'INVALID_METRIC_PARAMS');
        this.name = 'InvalidMetricParamsError';
    }
}

export class InvalidScalerParamsError extends ConfigurationError {
    constructor(public readonly featureName: string, message: string) {
        super(`Feature '${featureName}': ${message}`, 'INVALID_SCALER_PARAMS');
        this.name = 'InvalidScalerParamsError';
    }
}

export class UnknownMetricError extends ConfigurationError {
    constructor(name: string) {
        super(`No custom metric registered under '${name}'`, 'UNKNOWN_METRIC');
        this.name = 'UnknownMetricError';
    }
}

export class UnknownScalerError extends ConfigurationError {
    constructor(name: string) {
        super(`No custom scaler registered under '${name}'`, 'UNKNOWN_SCALER');
        this.name = 'UnknownScalerError';
    }
}

export class DuplicateRegistrationError extends ConfigurationError {
    constructor(registry: string, name: string) {
        super(`Cannot register ${registry} '${name}': name is empty, reserved or already taken`, 'DUPLICATE_REGISTRATION');
        this.name = 'DuplicateRegistrationError';
    }
}

export class InvalidPrototypeError extends ConfigurationError {
    constructor(public readonly featureName: string, message: string) {
        super(`Feature '${featureName}' prototype is invalid: ${message}`, 'INVALID_PROTOTYPE');
        this.name = 'InvalidPrototypeError';
    }
}

export class InvalidConfigError extends ConfigurationError {
    constructor(public readonly issues: string[]) {
        super(`Invalid feature space config:\n  ${issues.join('\n  ')}`, 'INVALID_CONFIG');
        this.name = 'InvalidConfigError';
    }
}

// ============================================================================
// Input errors (raised per compute call)
// ============================================================================

export class InputError extends FeatureSpaceError {
    constructor(message: string, code: string, public featureName?: string) {
        super(message, code);
        this.name = 'InputError';
    }
}

export class MissingFeatureError extends InputError {
    constructor(featureName: string, side: 'x' | 'y') {
        super(`Element ${side} has no value for feature '${featureName}'`, 'MISSING_FEATURE', featureName);
        this.name = 'MissingFeatureError';
    }
}

export class TypeMismatchError extends InputError {
    constructor(message: string, featureName?: string) {
        super(message, 'TYPE_MISMATCH', featureName);
        this.name = 'TypeMismatchError';
    }
}

export class DimensionMismatchError extends InputError {
    constructor(public readonly expected: number, public readonly actual: number, featureName?: string) {
        super(`Expected a vector of length ${expected}, got ${actual}`, 'DIMENSION_MISMATCH', featureName);
        this.name = 'DimensionMismatchError';
    }
}

export class InvalidDistributionError extends InputError {
    constructor(message: string, featureName?: string) {
        super(message, 'INVALID_DISTRIBUTION', featureName);
        this.name = 'InvalidDistributionError';
    }
}

export class DegenerateInputError extends InputError {
    constructor(message: string, featureName?: string) {
        super(message, 'DEGENERATE_INPUT', featureName);
        this.name = 'DegenerateInputError';
    }
}

// ============================================================================
// Extension-contract errors (a metric or scaler broke its output range)
// ============================================================================

export class ExtensionContractError extends FeatureSpaceError {
    constructor(message: string, code: string, public readonly featureName: string) {
        super(message, code);
        this.name = 'ExtensionContractError';
    }
}

export class InvalidMetricOutputError extends ExtensionContractError {
    constructor(featureName: string, value: number) {
        super(`Metric for feature '${featureName}' returned ${value}; expected a finite number >= 0`, 'INVALID_METRIC_OUTPUT', featureName);
        this.name = 'InvalidMetricOutputError';
    }
}

export class InvalidScalerOutputError extends ExtensionContractError {
    constructor(featureName: string, value: number, raw: number) {
        super(`Scaler for feature '${featureName}' returned ${value} for raw distance ${raw}; expected a value in [0, 1]`, 'INVALID_SCALER_OUTPUT', featureName);
        this.name = 'InvalidScalerOutputError';
    }
}
