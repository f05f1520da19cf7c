/**
 * Transport-security error taxonomy.
 *
 * One class per failure kind. `kind` is a literal discriminant so callers can
 * branch on it for remediation messages and exit codes.
 */

export type TransportSecurityErrorKind =
    | 'TrustStoreUnreadable'
    | 'CertificateInvalid'
    | 'UnsupportedAlgorithm'
    | 'InternalInvariantViolation'
    | 'ValidationBypassUnavailable';

export type Severity = 'fatal' | 'warning';

/** Exit status for failures the user can fix (path, password, keystore contents). */
export const EXIT_USER_ERROR = 1;

/** sysexits EX_SOFTWARE: internal software error. */
export const EXIT_INTERNAL_ERROR = 70;

const BUG_NOTICE = '\nThis is a bug. Please report it to the maintainers of the upload client.';

export abstract class TransportSecurityError extends Error {
    abstract readonly kind: TransportSecurityErrorKind;
    abstract readonly severity: Severity;
    abstract readonly exitCode: number;

    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'TransportSecurityError';
    }
}

/** `empty`: the file decoded but holds no certificates. */
export type UnreadableReason = 'unreadable' | 'empty';

export class TrustStoreUnreadableError extends TransportSecurityError {
    readonly kind = 'TrustStoreUnreadable' as const;
    readonly severity = 'fatal' as const;
    readonly exitCode = EXIT_USER_ERROR;

    constructor(
        public readonly path: string,
        cause?: unknown,
        public readonly reason: UnreadableReason = 'unreadable'
    ) {
        super(reason === 'empty' ? emptyStoreMessage(path) : unreadableMessage(path), cause);
        this.name = 'TrustStoreUnreadableError';
    }
}

function unreadableMessage(path: string): string {
    return `Failed to read trust store file ${path}` +
        '\nPlease make sure that the file exists and is readable and that you provided the correct password.' +
        ' Please also make sure that the trust store is a valid PKCS#12 file.' +
        ' You can use openssl to check this:' +
        `\nopenssl pkcs12 -info -nokeys -in ${path}`;
}

function emptyStoreMessage(path: string): string {
    return `The trust store file ${path} does not contain any certificates.` +
        '\nPlease add the certificates of the servers or certificate authorities you want to trust, e.g. with' +
        `\nopenssl pkcs12 -export -nokeys -in certificates.pem -out ${path}`;
}

export class CertificateInvalidError extends TransportSecurityError {
    readonly kind = 'CertificateInvalid' as const;
    readonly severity = 'fatal' as const;
    readonly exitCode = EXIT_USER_ERROR;

    constructor(
        public readonly path: string,
        cause?: unknown
    ) {
        super(
            `Failed to load one of the certificates in the trust store file ${path}` +
            '\nPlease make sure that the certificate is stored correctly and the certificate version and encoding are supported.',
            cause
        );
        this.name = 'CertificateInvalidError';
    }
}

export class UnsupportedAlgorithmError extends TransportSecurityError {
    readonly kind = 'UnsupportedAlgorithm' as const;
    readonly severity = 'fatal' as const;
    readonly exitCode = EXIT_USER_ERROR;

    constructor(
        public readonly path: string,
        public readonly algorithm: string,
        cause?: unknown
    ) {
        super(
            `Failed to verify the integrity of the trust store file ${path}` +
            ` because it uses an unsupported hashing algorithm (${algorithm}).` +
            '\nPlease change the trust store so it uses a supported algorithm' +
            ' (e.g. the SHA-256 default used by `openssl pkcs12 -export` is supported).',
            cause
        );
        this.name = 'UnsupportedAlgorithmError';
    }
}

export class InternalInvariantViolationError extends TransportSecurityError {
    readonly kind = 'InternalInvariantViolation' as const;
    readonly severity = 'fatal' as const;
    readonly exitCode = EXIT_INTERNAL_ERROR;

    constructor(
        public readonly detail: string,
        cause?: unknown
    ) {
        super(`${detail}${BUG_NOTICE}`, cause);
        this.name = 'InternalInvariantViolationError';
    }
}

export class ValidationBypassUnavailableError extends TransportSecurityError {
    readonly kind = 'ValidationBypassUnavailable' as const;
    readonly severity = 'warning' as const;
    readonly exitCode = 0;

    constructor(cause?: unknown) {
        super('Could not disable SSL certificate validation. Leaving it enabled', cause);
        this.name = 'ValidationBypassUnavailableError';
    }
}

/** Failures that abort client construction. */
export type TrustStoreError =
    | TrustStoreUnreadableError
    | CertificateInvalidError
    | UnsupportedAlgorithmError
    | InternalInvariantViolationError;

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.stack || `${cause.name}: ${cause.message}`;
    }
    return String(cause);
}
