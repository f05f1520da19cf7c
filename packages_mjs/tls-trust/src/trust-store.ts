/**
 * PKCS#12 trust store decoding.
 *
 * node-forge unpacks the container (integrity MAC, safe bags); certificates
 * are parsed with `X509Certificate` so every key type Node supports is
 * accepted.
 */
import { readFileSync } from 'node:fs';
import { X509Certificate } from 'node:crypto';
import * as forge from 'node-forge';
import {
    CertificateInvalidError,
    InternalInvariantViolationError,
    TrustStoreError,
    TrustStoreUnreadableError,
    UnsupportedAlgorithmError
} from './errors';
import { err, ok, Result } from './result';

export const DEFAULT_TRUST_STORE_TYPE = 'PKCS12';

/** OIDs of the MAC digests node-forge can verify: SHA-1, SHA-256, SHA-384, SHA-512, MD5. */
export const SUPPORTED_MAC_ALGORITHMS: ReadonlySet<string> = new Set([
    '1.3.14.3.2.26',
    '2.16.840.1.101.3.4.2.1',
    '2.16.840.1.101.3.4.2.2',
    '2.16.840.1.101.3.4.2.3',
    '1.2.840.113549.2.5'
]);

// Messages node-forge throws for certificate bags it cannot decode
const CERTIFICATE_BAG_ERRORS = [
    'Cannot read PKCS#12 CertBag',
    'Unsupported certificate type'
];

export interface TrustStore {
    readonly path: string;
    readonly type: string;
    /** alias -> certificate chain */
    readonly entries: ReadonlyMap<string, readonly X509Certificate[]>;
}

export function trustedCertificates(store: TrustStore): X509Certificate[] {
    return [...store.entries.values()].flat();
}

export function loadTrustStore(path: string, password?: string): Result<TrustStore, TrustStoreError> {
    let der: string;
    try {
        der = readFileSync(path).toString('binary');
    } catch (error) {
        return err(new TrustStoreUnreadableError(path, error));
    }

    let pfxAsn1: forge.asn1.Asn1;
    try {
        pfxAsn1 = forge.asn1.fromDer(der);
    } catch (error) {
        return err(new TrustStoreUnreadableError(path, error));
    }

    const macAlgorithm = readMacAlgorithm(pfxAsn1);
    if (macAlgorithm !== null && !SUPPORTED_MAC_ALGORITHMS.has(macAlgorithm)) {
        return err(new UnsupportedAlgorithmError(path, macAlgorithm));
    }

    let pfx: forge.pkcs12.Pkcs12Pfx;
    try {
        pfx = forge.pkcs12.pkcs12FromAsn1(pfxAsn1, false, password ?? '');
    } catch (error) {
        if (isCertificateBagError(error)) {
            return err(new CertificateInvalidError(path, error));
        }
        return err(new TrustStoreUnreadableError(path, error));
    }

    const store = collectEntries(path, pfx);
    if (store.ok && store.value.entries.size === 0) {
        return err(new TrustStoreUnreadableError(path, undefined, 'empty'));
    }
    return store;
}

function isCertificateBagError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    const { message } = error;
    return CERTIFICATE_BAG_ERRORS.some((prefix) => message.startsWith(prefix));
}

/**
 * OID of PFX.macData.mac.digestAlgorithm, or null when the file carries no MAC.
 */
export function readMacAlgorithm(pfx: forge.asn1.Asn1): string | null {
    const macData = childAt(pfx, 2);
    const digestInfo = childAt(macData, 0);
    const algorithmIdentifier = childAt(digestInfo, 0);
    const oid = childAt(algorithmIdentifier, 0);
    if (!oid || oid.type !== forge.asn1.Type.OID || typeof oid.value !== 'string') {
        return null;
    }
    return forge.asn1.derToOid(oid.value);
}

function childAt(node: forge.asn1.Asn1 | undefined, index: number): forge.asn1.Asn1 | undefined {
    if (!node || !Array.isArray(node.value)) {
        return undefined;
    }
    return node.value[index];
}

function collectEntries(path: string, pfx: forge.pkcs12.Pkcs12Pfx): Result<TrustStore, TrustStoreError> {
    const bagType = forge.pki.oids.certBag;
    const bags = pfx.getBags({ bagType })[bagType] ?? [];
    const entries = new Map<string, X509Certificate[]>();

    for (const [index, bag] of bags.entries()) {
        const structure = bag.cert ? forge.pki.certificateToAsn1(bag.cert) : rawCertificate(bag);
        if (structure === null) {
            return err(new InternalInvariantViolationError(
                `Certificate bag ${index} of ${path} carries neither a certificate nor its ASN.1 structure.`
            ));
        }

        let certificate: X509Certificate;
        try {
            certificate = new X509Certificate(Buffer.from(forge.asn1.toDer(structure).getBytes(), 'binary'));
        } catch (error) {
            return err(new CertificateInvalidError(path, error));
        }

        const alias = aliasOf(bag.attributes, index);
        const chain = entries.get(alias);
        if (chain) {
            chain.push(certificate);
        } else {
            entries.set(alias, [certificate]);
        }
    }

    return ok({ path, type: DEFAULT_TRUST_STORE_TYPE, entries });
}

// forge keeps the raw structure of certificates it cannot model itself (e.g. EC keys)
function rawCertificate(bag: forge.pkcs12.Bag): forge.asn1.Asn1 | null {
    if (!('asn1' in bag)) {
        return null;
    }
    const structure: unknown = bag.asn1;
    return isAsn1(structure) ? structure : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isAsn1(value: unknown): value is forge.asn1.Asn1 {
    return isRecord(value) &&
        typeof value.tagClass === 'number' &&
        typeof value.type === 'number' &&
        (typeof value.value === 'string' || Array.isArray(value.value));
}

function aliasOf(attributes: unknown, index: number): string {
    if (isRecord(attributes)) {
        const names = attributes.friendlyName;
        if (Array.isArray(names) && typeof names[0] === 'string' && names[0].length > 0) {
            return decodeBmpString(names[0]);
        }
    }
    return `certificate-${index}`;
}

// friendlyName is a BMPString; forge hands it over as undecoded UTF-16BE bytes
function decodeBmpString(value: string): string {
    if (value.length % 2 !== 0 || !value.includes('\0') || !/^[\x00-\xff]*$/.test(value)) {
        return value;
    }
    return Buffer.from(value, 'binary').swap16().toString('utf16le');
}
