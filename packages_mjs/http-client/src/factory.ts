/**
 * Factory for upload HTTP clients.
 */
import type { SecureVersion } from "node:tls";
import {
    ErrorReporter,
    getLogger,
    ProcessErrorReporter,
    TlsProvider,
    TrustManagerFactory,
} from "@upload-client/tls-trust";
import { ClientBuilder } from "./builder";
import { ClientConfiguration } from "./config";
import { UploadHttpClient } from "./http-client";
import { TrustStoreConfigurator } from "./trust-store-configurator";
import { ValidationBypass } from "./validation-bypass";

const logger = getLogger("factory");

export interface ClientFactoryOptions {
    reporter?: ErrorReporter;
    tlsProvider?: TlsProvider;
    trustManagerFactory?: TrustManagerFactory;
    protocol?: SecureVersion;
}

export class ClientFactory {
    private readonly trustStoreConfigurator: TrustStoreConfigurator;
    private readonly validationBypass: ValidationBypass;

    constructor(options: ClientFactoryOptions = {}) {
        const reporter = options.reporter || new ProcessErrorReporter();
        this.trustStoreConfigurator = new TrustStoreConfigurator({
            reporter,
            trustManagerFactory: options.trustManagerFactory,
            tlsProvider: options.tlsProvider,
            protocol: options.protocol,
        });
        this.validationBypass = new ValidationBypass({
            reporter,
            tlsProvider: options.tlsProvider,
            protocol: options.protocol,
        });
    }

    create(config: ClientConfiguration): UploadHttpClient {
        const builder = new ClientBuilder();

        // 1. Timeouts: one value for every phase
        const timeoutMs = config.timeoutSeconds * 1000;
        builder.connectTimeout(timeoutMs).readTimeout(timeoutMs).writeTimeout(timeoutMs);

        // 2. Never follow redirects; they could carry credentials to other hosts
        builder.followRedirects(false).followSslRedirects(false);

        // 3. Custom trust store
        if (config.trustStorePath) {
            logger.debug(`Using trust store ${config.trustStorePath}`);
            this.trustStoreConfigurator.configure(builder, config.trustStorePath, config.trustStorePassword);
        }

        // 4. Disabled validation overrides the trust store
        if (!config.validateSsl) {
            this.validationBypass.disable(builder);
        }

        return builder.build();
    }
}

export function createClient(config: ClientConfiguration, options?: ClientFactoryOptions): UploadHttpClient {
    return new ClientFactory(options).create(config);
}
