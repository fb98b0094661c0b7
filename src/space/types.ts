import type { MetricRegistry } from '../metrics/metrics.js';
import type { ScalerRegistry } from '../metrics/scalers.js';

export type DistanceLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** Default tolerance for the Hellinger `sum(x) = 1` check. */
export const DEFAULT_DISTRIBUTION_TOLERANCE = 1e-6;

export type BuildOptions = {
    /** Optional logger hook for build summaries and configuration warnings. */
    logger?: DistanceLogger | null;
    /** Registry used to resolve metric kinds. Default: the shared default registry. */
    metrics?: MetricRegistry;
    /** Registry used to resolve scaler kinds. Default: the shared default registry. */
    scalers?: ScalerRegistry;
    /** Tolerance for Hellinger features that do not set `params.tolerance`. Default 1e-6. */
    distributionTolerance?: number;
};

export type DistanceEngineOptions = {
    /** Optional logger hook; receives one `error` line per failed feature before the error propagates. */
    logger?: DistanceLogger | null;
};
