/**
 * Fixed error taxonomy shared by every service. Each kind maps to exactly one
 * severity; severity alone decides visibility and reporting.
 */

export const ERROR_KINDS = [
    'network',
    'timeout',
    'validation',
    'notFound',
    'unauthorized',
    'forbidden',
    'cancelled',
    'storage',
    'server',
    'processing',
    'database',
    'encoding',
    'decoding',
    'unknown',
    'dataCorruption',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type ErrorSeverity = 'info' | 'warning' | 'error' | 'critical';

/** Ordinal rank: info < warning < error < critical. */
export const SEVERITY_RANK: Readonly<Record<ErrorSeverity, number>> = {
    info: 0,
    warning: 1,
    error: 2,
    critical: 3,
};

interface KindDescriptor {
    readonly severity: ErrorSeverity;
    readonly retryable: boolean;
    readonly description: string;
    readonly recoverySuggestion: string;
}

const KIND_DESCRIPTORS: Readonly<Record<ErrorKind, KindDescriptor>> = {
    network: {
        severity: 'warning',
        retryable: true,
        description: 'A network error occurred.',
        recoverySuggestion: 'Check the network connection and try again.',
    },
    timeout: {
        severity: 'warning',
        retryable: true,
        description: 'The request timed out.',
        recoverySuggestion: 'Check the network connection and try again.',
    },
    validation: {
        severity: 'info',
        retryable: false,
        description: 'The input is invalid.',
        recoverySuggestion: 'Check the format and content of the input.',
    },
    notFound: {
        severity: 'info',
        retryable: false,
        description: 'The requested resource was not found.',
        recoverySuggestion: 'Confirm the resource path or identifier.',
    },
    unauthorized: {
        severity: 'warning',
        retryable: false,
        description: 'Authentication is required.',
        recoverySuggestion: 'Sign in and try again.',
    },
    forbidden: {
        severity: 'warning',
        retryable: false,
        description: 'Access was denied.',
        recoverySuggestion: 'Ask an administrator for access.',
    },
    cancelled: {
        severity: 'info',
        retryable: false,
        description: 'The operation was cancelled.',
        recoverySuggestion: 'Start the operation again if it is still needed.',
    },
    storage: {
        severity: 'error',
        retryable: false,
        description: 'Data could not be stored.',
        recoverySuggestion: 'Check the available storage space and try again.',
    },
    server: {
        severity: 'error',
        retryable: true,
        description: 'The server reported an error.',
        recoverySuggestion: 'Try again later.',
    },
    processing: {
        severity: 'error',
        retryable: false,
        description: 'Processing the data failed.',
        recoverySuggestion: 'Check the data format and try again.',
    },
    database: {
        severity: 'error',
        retryable: false,
        description: 'A database operation failed.',
        recoverySuggestion: 'Restart the application or clear the cache and try again.',
    },
    encoding: {
        severity: 'warning',
        retryable: false,
        description: 'Data could not be encoded.',
        recoverySuggestion: 'Check the data format and try again.',
    },
    decoding: {
        severity: 'warning',
        retryable: false,
        description: 'Data could not be decoded.',
        recoverySuggestion: 'Check the data format and try again.',
    },
    unknown: {
        severity: 'critical',
        retryable: false,
        description: 'An unexpected error occurred.',
        recoverySuggestion: 'Restart the application and try again.',
    },
    dataCorruption: {
        severity: 'critical',
        retryable: false,
        description: 'Stored data is corrupted.',
        recoverySuggestion: 'Import the data again.',
    },
};

export function severityOf(kind: ErrorKind): ErrorSeverity {
    return KIND_DESCRIPTORS[kind].severity;
}

export function isRetryableKind(kind: ErrorKind): boolean {
    return KIND_DESCRIPTORS[kind].retryable;
}

export function describeKind(kind: ErrorKind): string {
    return KIND_DESCRIPTORS[kind].description;
}

export function recoverySuggestionFor(kind: ErrorKind): string {
    return KIND_DESCRIPTORS[kind].recoverySuggestion;
}

/** Warnings and above are surfaced to the user. */
export function isUserVisible(severity: ErrorSeverity): boolean {
    return SEVERITY_RANK[severity] >= SEVERITY_RANK.warning;
}

/** Errors and above are forwarded to telemetry. */
export function isReportable(severity: ErrorSeverity): boolean {
    return SEVERITY_RANK[severity] >= SEVERITY_RANK.error;
}
