/**
 * Turns off certificate and hostname validation on a client builder.
 */
import type { SecureVersion } from "node:tls";
import {
    ACCEPT_ALL_POLICY,
    ACCEPT_ANY_HOSTNAME,
    DEFAULT_TLS_PROTOCOL,
    ErrorReporter,
    getLogger,
    NodeTlsProvider,
    reportWarning,
    TlsContext,
    TlsProvider,
    ValidationBypassUnavailableError,
} from "@upload-client/tls-trust";
import { ClientBuilder } from "./builder";

const logger = getLogger("validation-bypass");

export interface ValidationBypassOptions {
    reporter: ErrorReporter;
    tlsProvider?: TlsProvider;
    protocol?: SecureVersion;
}

export class ValidationBypass {
    private readonly reporter: ErrorReporter;
    private readonly tlsProvider: TlsProvider;
    private readonly protocol: SecureVersion;

    constructor(options: ValidationBypassOptions) {
        this.reporter = options.reporter;
        this.tlsProvider = options.tlsProvider || new NodeTlsProvider();
        this.protocol = options.protocol || DEFAULT_TLS_PROTOCOL;
    }

    /**
     * Replaces any trust configuration of the builder with one that accepts
     * every certificate and hostname. If that context cannot be built, warns
     * and leaves the builder as it was.
     */
    disable(builder: ClientBuilder): void {
        let context: TlsContext;
        try {
            context = this.tlsProvider.createContext(ACCEPT_ALL_POLICY, this.protocol);
        } catch (error) {
            reportWarning(this.reporter, new ValidationBypassUnavailableError(error));
            return;
        }

        logger.debug("SSL certificate and hostname validation disabled");
        builder
            .sslSocketFactory(context.socketFactory, ACCEPT_ALL_POLICY)
            .hostnameVerifier(ACCEPT_ANY_HOSTNAME);
    }
}
