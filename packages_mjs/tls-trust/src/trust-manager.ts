/**
 * Trust managers decide which peer certificate chains are trusted.
 */
import type { X509Certificate } from 'node:crypto';
import type { PeerCertificate } from 'node:tls';
import { InternalInvariantViolationError } from './errors';
import { err, ok, Result } from './result';
import { TrustStore, trustedCertificates } from './trust-store';

export const DEFAULT_TRUST_MANAGER_ALGORITHM = 'PKIX';

export interface X509TrustManager {
    readonly kind: 'x509';
    readonly algorithm: string;
    /** Trust anchors handed to the TLS stack. */
    readonly acceptedIssuers: readonly X509Certificate[];
    /** When false, chains are accepted without verification. */
    readonly verifiesChain: boolean;
}

/** A manager without X.509 capability; it cannot back a TLS context. */
export interface OpaqueTrustManager {
    readonly kind: 'opaque';
    readonly algorithm: string;
}

export type TrustManager = X509TrustManager | OpaqueTrustManager;

/** Same contract as `tls.checkServerIdentity`: return an Error to reject the host. */
export type HostnameVerifier = (hostname: string, certificate: PeerCertificate) => Error | undefined;

export interface TrustManagerFactory {
    readonly algorithm: string;
    getTrustManagers(store: TrustStore): readonly TrustManager[];
}

/**
 * Trusts exactly the certificates of the store. A store without
 * certificates yields no managers.
 */
export class PkixTrustManagerFactory implements TrustManagerFactory {
    readonly algorithm = DEFAULT_TRUST_MANAGER_ALGORITHM;

    getTrustManagers(store: TrustStore): readonly TrustManager[] {
        const anchors = trustedCertificates(store);
        if (anchors.length === 0) {
            return [];
        }
        return [Object.freeze({
            kind: 'x509',
            algorithm: this.algorithm,
            acceptedIssuers: Object.freeze(anchors),
            verifiesChain: true
        })];
    }
}

export function asX509TrustManager(manager: TrustManager): Result<X509TrustManager, InternalInvariantViolationError> {
    if (manager.kind !== 'x509') {
        return err(new InternalInvariantViolationError(
            `Trust manager (${manager.algorithm}) is not of X509 format.`
        ));
    }
    return ok(manager);
}

/** Accepts every certificate chain. Stateless and shared by reference. */
export const ACCEPT_ALL_POLICY: X509TrustManager = Object.freeze({
    kind: 'x509',
    algorithm: 'accept-all',
    acceptedIssuers: Object.freeze([]),
    verifiesChain: false
});

export const ACCEPT_ANY_HOSTNAME: HostnameVerifier = () => undefined;
