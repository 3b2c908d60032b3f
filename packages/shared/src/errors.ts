/**
 * @perch/shared: Service Errors
 *
 * Every service contract rejects with a ServiceError. Presenters read
 * `message` into the user-facing error dialog, so the prefix for each
 * kind is part of the contract.
 */

export type ServiceErrorKind =
    | 'not_found'
    | 'validation'
    | 'io'
    | 'serialization'
    | 'storage'
    | 'network'
    | 'authentication'
    | 'configuration'
    | 'cancelled'
    | 'internal';

const KIND_PREFIX: Record<ServiceErrorKind, string> = {
    not_found: 'Not found',
    validation: 'Validation error',
    io: 'I/O error',
    serialization: 'Serialization error',
    storage: 'Storage error',
    network: 'Network error',
    authentication: 'Authentication error',
    configuration: 'Configuration error',
    cancelled: 'Operation cancelled',
    internal: 'Internal error',
};

export class ServiceError extends Error {
    readonly kind: ServiceErrorKind;
    /** The message without the kind prefix */
    readonly detail: string;

    constructor(kind: ServiceErrorKind, detail = '', options?: { cause?: unknown }) {
        super(detail ? `${KIND_PREFIX[kind]}: ${detail}` : KIND_PREFIX[kind], options);
        this.name = 'ServiceError';
        this.kind = kind;
        this.detail = detail;
    }

    static notFound(detail: string): ServiceError {
        return new ServiceError('not_found', detail);
    }

    static validation(detail: string): ServiceError {
        return new ServiceError('validation', detail);
    }

    static storage(detail: string, cause?: unknown): ServiceError {
        return new ServiceError('storage', detail, { cause });
    }

    static network(detail: string): ServiceError {
        return new ServiceError('network', detail);
    }

    static authentication(detail: string): ServiceError {
        return new ServiceError('authentication', detail);
    }

    static configuration(detail: string): ServiceError {
        return new ServiceError('configuration', detail);
    }

    static cancelled(): ServiceError {
        return new ServiceError('cancelled');
    }

    static internal(detail: string, cause?: unknown): ServiceError {
        return new ServiceError('internal', detail, { cause });
    }
}

export function isServiceError(err: unknown): err is ServiceError {
    return err instanceof ServiceError;
}

/** Extracts a printable message from anything that was thrown */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}
