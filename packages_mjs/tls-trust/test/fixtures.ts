/**
 * Certificates and PKCS#12 trust stores generated for tests.
 */
import { generateKeyPairSync, randomBytes } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import * as forge from 'node-forge';

export const TEST_PASSWORD = 'test-secret';

export interface SelfSignedCertificate {
    certificate: forge.pki.Certificate;
    certPem: string;
    keyPem: string;
}

export interface SubjectAltNames {
    dnsNames?: string[];
    ipAddresses?: string[];
}

export function createSelfSignedCertificate(
    commonName: string,
    altNames: SubjectAltNames = { dnsNames: ['localhost'], ipAddresses: ['127.0.0.1'] }
): SelfSignedCertificate {
    return issueCertificate(commonName, altNames, null);
}

/** A server certificate signed by `issuer`, which must be a CA from this module. */
export function createCertificateSignedBy(
    commonName: string,
    issuer: SelfSignedCertificate,
    altNames: SubjectAltNames = { dnsNames: ['localhost'], ipAddresses: ['127.0.0.1'] }
): SelfSignedCertificate {
    return issueCertificate(commonName, altNames, issuer);
}

function issueCertificate(
    commonName: string,
    altNames: SubjectAltNames,
    issuer: SelfSignedCertificate | null
): SelfSignedCertificate {
    const { publicKey, privateKey } = generateKeyPairSync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs1', format: 'pem' }
    });

    const certificate = forge.pki.createCertificate();
    certificate.publicKey = forge.pki.publicKeyFromPem(publicKey);
    // leading 0x01 keeps the serial positive
    certificate.serialNumber = `01${randomBytes(8).toString('hex')}`;
    certificate.validity.notBefore = new Date(Date.now() - 60 * 60 * 1000);
    certificate.validity.notAfter = new Date(Date.now() + 24 * 60 * 60 * 1000);

    certificate.setSubject([{ name: 'commonName', value: commonName }]);
    certificate.setIssuer(issuer ? issuer.certificate.subject.attributes : [{ name: 'commonName', value: commonName }]);
    certificate.setExtensions([
        { name: 'basicConstraints', cA: issuer === null },
        issuer === null
            ? { name: 'keyUsage', keyCertSign: true, digitalSignature: true, keyEncipherment: true }
            : { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
        { name: 'extKeyUsage', serverAuth: true },
        {
            name: 'subjectAltName',
            altNames: [
                ...(altNames.dnsNames ?? []).map((value) => ({ type: 2, value })),
                ...(altNames.ipAddresses ?? []).map((ip) => ({ type: 7, ip }))
            ]
        }
    ]);
    certificate.sign(forge.pki.privateKeyFromPem(issuer ? issuer.keyPem : privateKey), forge.md.sha256.create());

    return {
        certificate,
        certPem: forge.pki.certificateToPem(certificate),
        keyPem: privateKey
    };
}

export class TempDir {
    readonly path: string;

    constructor() {
        this.path = mkdtempSync(path.join(tmpdir(), 'tls-trust-'));
    }

    file(name: string, contents: string | Buffer): string {
        const filePath = path.join(this.path, name);
        writeFileSync(filePath, contents);
        return filePath;
    }

    remove(): void {
        rmSync(this.path, { recursive: true, force: true });
    }
}

function toBuffer(structure: forge.asn1.Asn1): Buffer {
    return Buffer.from(forge.asn1.toDer(structure).getBytes(), 'binary');
}

export function trustStoreAsn1(
    certificates: forge.pki.Certificate[],
    password: string = TEST_PASSWORD,
    friendlyName?: string
): forge.asn1.Asn1 {
    return forge.pkcs12.toPkcs12Asn1(null, certificates, password, {
        algorithm: '3des',
        generateLocalKeyId: false,
        ...(friendlyName ? { friendlyName } : {})
    });
}

export function writeTrustStore(
    dir: TempDir,
    name: string,
    certificates: forge.pki.Certificate[],
    password: string = TEST_PASSWORD,
    friendlyName?: string
): string {
    return dir.file(name, toBuffer(trustStoreAsn1(certificates, password, friendlyName)));
}

function descend(node: forge.asn1.Asn1, ...indexes: number[]): forge.asn1.Asn1 {
    let current = node;
    for (const index of indexes) {
        const children = current.value;
        const next = Array.isArray(children) ? children[index] : undefined;
        if (!next) {
            throw new Error(`No ASN.1 child at index ${index}`);
        }
        current = next;
    }
    return current;
}

/** A trust store whose integrity MAC claims the given digest OID. */
export function writeTrustStoreWithMacAlgorithm(
    dir: TempDir,
    name: string,
    certificates: forge.pki.Certificate[],
    macAlgorithmOid: string
): string {
    const pfx = trustStoreAsn1(certificates);
    // PFX.macData.mac.digestAlgorithm.algorithm
    descend(pfx, 2, 0, 0, 0).value = forge.asn1.oidToDer(macAlgorithmOid).getBytes();
    return dir.file(name, toBuffer(pfx));
}

type CertBagShape = 'not-x509-structure' | 'malformed-bag' | 'unsupported-type';

/**
 * A MAC-less trust store with one certificate bag that cannot be read as an
 * X.509 certificate:
 * - `not-x509-structure`: well-formed bag whose DER is not a certificate
 * - `malformed-bag`: certValue is an INTEGER instead of `[0] EXPLICIT OCTET STRING`
 * - `unsupported-type`: bag declares an SDSI certificate
 */
export function writeTrustStoreWithBrokenCertificate(
    dir: TempDir,
    name: string,
    shape: CertBagShape = 'not-x509-structure'
): string {
    const { asn1, pki } = forge;
    const { UNIVERSAL, CONTEXT_SPECIFIC } = asn1.Class;
    const { SEQUENCE, OID, OCTETSTRING, INTEGER } = asn1.Type;

    const oid = (value: string) => asn1.create(UNIVERSAL, OID, false, asn1.oidToDer(value).getBytes());
    const octets = (structure: forge.asn1.Asn1) =>
        asn1.create(UNIVERSAL, OCTETSTRING, false, asn1.toDer(structure).getBytes());
    const explicit = (structure: forge.asn1.Asn1) => asn1.create(CONTEXT_SPECIFIC, 0, true, [structure]);
    const sequence = (...items: forge.asn1.Asn1[]) => asn1.create(UNIVERSAL, SEQUENCE, true, items);
    const integer = (value: number) => asn1.create(UNIVERSAL, INTEGER, false, asn1.integerToDer(value).getBytes());

    const notACertificate = sequence(integer(1));
    const certBags: Record<CertBagShape, forge.asn1.Asn1> = {
        'not-x509-structure': sequence(oid(pki.oids.x509Certificate), explicit(octets(notACertificate))),
        'malformed-bag': sequence(oid(pki.oids.x509Certificate), integer(1)),
        // PKCS#9 sdsiCertificate
        'unsupported-type': sequence(oid('1.2.840.113549.1.9.22.2'), explicit(octets(notACertificate)))
    };
    const safeContents = sequence(sequence(oid(pki.oids.certBag), explicit(certBags[shape])));
    const authenticatedSafe = sequence(sequence(oid(pki.oids.data), explicit(octets(safeContents))));
    const pfx = sequence(integer(3), sequence(oid(pki.oids.data), explicit(octets(authenticatedSafe))));

    return dir.file(name, toBuffer(pfx));
}
