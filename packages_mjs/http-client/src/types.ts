/**
 * Data models for the upload HTTP client.
 */
import type { Dispatcher } from "undici";
import type { HostnameVerifier, TlsSocketFactory, X509TrustManager } from "@upload-client/tls-trust";

export interface TimeoutSettings {
    connectMs: number;
    readMs: number;
    writeMs: number;
}

export interface TlsSettings {
    socketFactory: TlsSocketFactory;
    trustManager: X509TrustManager;
}

// Frozen snapshot of everything a built client was configured with
export interface ClientSettings {
    readonly timeouts: Readonly<TimeoutSettings>;
    readonly followRedirects: boolean;
    readonly followSslRedirects: boolean;
    /** null: platform trust store and default validation */
    readonly tls: Readonly<TlsSettings> | null;
    readonly hostnameVerifier: HostnameVerifier;
}

export interface HttpRequest {
    method: Dispatcher.HttpMethod;
    url: string;
    headers?: Record<string, string>;
    body?: string | Buffer | Uint8Array;
}

export interface HttpResponse {
    status: number;
    /** URL of the request that produced this response, after any redirects */
    url: string;
    headers: Dispatcher.ResponseData["headers"];
    body: string;
}
