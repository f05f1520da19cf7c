/**
 * Builder for upload HTTP clients backed by an undici Agent.
 */
import { checkServerIdentity } from "node:tls";
import { Agent } from "undici";
import type { HostnameVerifier, TlsSocketFactory, X509TrustManager } from "@upload-client/tls-trust";
import { createConnector } from "./connector";
import { UploadHttpClient } from "./http-client";
import { ClientSettings, TimeoutSettings, TlsSettings } from "./types";

export const DEFAULT_TIMEOUT_MS = 10_000;

export class ClientBuilder {
    private timeouts: TimeoutSettings = {
        connectMs: DEFAULT_TIMEOUT_MS,
        readMs: DEFAULT_TIMEOUT_MS,
        writeMs: DEFAULT_TIMEOUT_MS,
    };
    private redirects = true;
    private sslRedirects = true;
    private tls: TlsSettings | null = null;
    private verifier: HostnameVerifier = checkServerIdentity;

    connectTimeout(ms: number): this {
        this.timeouts.connectMs = ms;
        return this;
    }

    readTimeout(ms: number): this {
        this.timeouts.readMs = ms;
        return this;
    }

    writeTimeout(ms: number): this {
        this.timeouts.writeMs = ms;
        return this;
    }

    followRedirects(follow: boolean): this {
        this.redirects = follow;
        return this;
    }

    /** Whether redirects may switch between http and https. Only consulted when redirects are followed. */
    followSslRedirects(follow: boolean): this {
        this.sslRedirects = follow;
        return this;
    }

    sslSocketFactory(socketFactory: TlsSocketFactory, trustManager: X509TrustManager): this {
        this.tls = { socketFactory, trustManager };
        return this;
    }

    hostnameVerifier(verifier: HostnameVerifier): this {
        this.verifier = verifier;
        return this;
    }

    settings(): ClientSettings {
        return Object.freeze({
            timeouts: Object.freeze({ ...this.timeouts }),
            followRedirects: this.redirects,
            followSslRedirects: this.sslRedirects,
            tls: this.tls ? Object.freeze({ ...this.tls }) : null,
            hostnameVerifier: this.verifier,
        });
    }

    build(): UploadHttpClient {
        const settings = this.settings();
        const dispatcher = new Agent({
            connect: createConnector(settings),
            headersTimeout: settings.timeouts.readMs,
            bodyTimeout: settings.timeouts.readMs,
        });
        return new UploadHttpClient(settings, dispatcher);
    }
}
