/**
 * Wires a custom PKCS#12 trust store into a client builder.
 */
import type { SecureVersion } from "node:tls";
import {
    asX509TrustManager,
    DEFAULT_TLS_PROTOCOL,
    err,
    ErrorReporter,
    getLogger,
    InternalInvariantViolationError,
    loadTrustStore,
    NodeTlsProvider,
    ok,
    PkixTrustManagerFactory,
    reportFatal,
    Result,
    TlsContext,
    TlsProvider,
    TrustManagerFactory,
    TrustStoreError,
} from "@upload-client/tls-trust";
import { ClientBuilder } from "./builder";

const logger = getLogger("trust-store");

export interface TrustStoreConfiguratorOptions {
    reporter: ErrorReporter;
    trustManagerFactory?: TrustManagerFactory;
    tlsProvider?: TlsProvider;
    protocol?: SecureVersion;
}

export class TrustStoreConfigurator {
    private readonly reporter: ErrorReporter;
    private readonly trustManagerFactory: TrustManagerFactory;
    private readonly tlsProvider: TlsProvider;
    private readonly protocol: SecureVersion;

    constructor(options: TrustStoreConfiguratorOptions) {
        this.reporter = options.reporter;
        this.trustManagerFactory = options.trustManagerFactory || new PkixTrustManagerFactory();
        this.tlsProvider = options.tlsProvider || new NodeTlsProvider();
        this.protocol = options.protocol || DEFAULT_TLS_PROTOCOL;
    }

    /**
     * Configures the builder so the client accepts the certificates of the
     * trust store at `path`. Any failure is fatal.
     */
    configure(builder: ClientBuilder, path: string, password?: string): void {
        const context = this.createContext(path, password);
        if (!context.ok) {
            return reportFatal(this.reporter, context.error);
        }

        logger.debug(`Trusting ${context.value.trustManager.acceptedIssuers.length} certificate(s) from ${path}`);
        builder.sslSocketFactory(context.value.socketFactory, context.value.trustManager);
    }

    createContext(path: string, password?: string): Result<TlsContext, TrustStoreError> {
        const store = loadTrustStore(path, password);
        if (!store.ok) {
            return store;
        }

        const managers = this.trustManagerFactory.getTrustManagers(store.value);
        // Only the first manager is used, whatever the factory returns
        const first = managers[0];
        if (first === undefined) {
            return err(new InternalInvariantViolationError("No trust managers found."));
        }

        const trustManager = asX509TrustManager(first);
        if (!trustManager.ok) {
            return trustManager;
        }

        try {
            return ok(this.tlsProvider.createContext(trustManager.value, this.protocol));
        } catch (error) {
            return err(new InternalInvariantViolationError(
                `Failed to initialize the ${this.tlsProvider.name} TLS context with the trust managers.`,
                error
            ));
        }
    }
}
