/**
 * Sink for transport-security diagnostics.
 */
import {
    describeCause,
    EXIT_USER_ERROR,
    TrustStoreError,
    ValidationBypassUnavailableError
} from './errors';
import { getLogger, Logger } from './logger';

export interface ErrorReporter {
    /** Report a user-facing message together with its technical cause, then terminate. */
    fail(message: string, cause: unknown, exitCode?: number): never;
    /** Report a user-facing remediation message only, then terminate. */
    failWithoutTechnicalDetail(message: string, exitCode?: number): never;
    /** Report a problem and carry on. */
    warn(message: string, cause?: unknown): void;
}

export class ProcessErrorReporter implements ErrorReporter {
    constructor(
        private readonly logger: Logger = getLogger('reporter'),
        private readonly exit: (code: number) => never = (code) => process.exit(code)
    ) {}

    fail(message: string, cause: unknown, exitCode = EXIT_USER_ERROR): never {
        this.logger.error(message);
        this.logger.error(`Caused by: ${describeCause(cause)}`);
        return this.exit(exitCode);
    }

    failWithoutTechnicalDetail(message: string, exitCode = EXIT_USER_ERROR): never {
        this.logger.error(message);
        return this.exit(exitCode);
    }

    warn(message: string, cause?: unknown): void {
        if (cause === undefined) {
            this.logger.warn(message);
            return;
        }
        this.logger.warn(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`);
    }
}

export function reportFatal(reporter: ErrorReporter, error: TrustStoreError): never {
    switch (error.kind) {
        case 'TrustStoreUnreadable':
            return reporter.failWithoutTechnicalDetail(error.message, error.exitCode);
        case 'CertificateInvalid':
        case 'UnsupportedAlgorithm':
        case 'InternalInvariantViolation':
            return reporter.fail(error.message, error.cause ?? error, error.exitCode);
        default: {
            const unreachable: never = error;
            throw new Error(`Unhandled trust store error: ${String(unreachable)}`);
        }
    }
}

export function reportWarning(reporter: ErrorReporter, warning: ValidationBypassUnavailableError): void {
    reporter.warn(warning.message, warning.cause);
}
