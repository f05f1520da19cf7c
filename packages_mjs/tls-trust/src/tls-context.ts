/**
 * TLS negotiation contexts built from a single trust manager.
 */
import { createSecureContext, SecureContext, SecureContextOptions, SecureVersion } from 'node:tls';
import { X509TrustManager } from './trust-manager';

export const DEFAULT_TLS_PROTOCOL: SecureVersion = 'TLSv1.2';

/** Socket-level TLS settings a connector applies to every connection. */
export interface TlsSocketFactory {
    readonly secureContext: SecureContext;
    readonly protocol: SecureVersion;
}

export interface TlsContext {
    readonly trustManager: X509TrustManager;
    readonly socketFactory: TlsSocketFactory;
}

/**
 * Source of TLS contexts. `createContext` throws when the underlying crypto
 * library cannot build one (e.g. the protocol version is unavailable).
 */
export interface TlsProvider {
    readonly name: string;
    createContext(trustManager: X509TrustManager, protocol: SecureVersion): TlsContext;
}

/**
 * A verifying manager always replaces Node's bundled roots with its own
 * anchors; with none, `ca: []` trusts nothing. Only a manager that skips
 * chain verification leaves `ca` unset.
 */
export function secureContextOptions(trustManager: X509TrustManager, protocol: SecureVersion): SecureContextOptions {
    if (!trustManager.verifiesChain) {
        return { minVersion: protocol };
    }
    return {
        minVersion: protocol,
        ca: trustManager.acceptedIssuers.map((certificate) => certificate.toString())
    };
}

export class NodeTlsProvider implements TlsProvider {
    readonly name = 'node:tls';

    createContext(trustManager: X509TrustManager, protocol: SecureVersion): TlsContext {
        const secureContext = createSecureContext(secureContextOptions(trustManager, protocol));
        return Object.freeze({
            trustManager,
            socketFactory: Object.freeze({ secureContext, protocol })
        });
    }
}
