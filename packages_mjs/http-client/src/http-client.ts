/**
 * HTTP client used by the upload tool, based on undici.
 */
import { Dispatcher } from "undici";
import { getLogger } from "@upload-client/tls-trust";
import { ClientSettings, HttpRequest, HttpResponse } from "./types";

export const MAX_REDIRECTS = 20;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const logger = getLogger("http");

export class TooManyRedirectsError extends Error {
    constructor(public readonly url: string) {
        super(`Too many redirects (more than ${MAX_REDIRECTS}) starting at ${url}`);
        this.name = "TooManyRedirectsError";
    }
}

export class UploadHttpClient {
    constructor(
        readonly settings: ClientSettings,
        private readonly dispatcher: Dispatcher
    ) {}

    async request(request: HttpRequest): Promise<HttpResponse> {
        let url = new URL(request.url);
        let method = request.method;
        let body = request.body;
        let headers = { ...(request.headers || {}) };

        for (let hop = 0; ; hop++) {
            const response = await this.dispatch(url, method, headers, body);
            const target = this.redirectTarget(response, url);
            if (!target) {
                return response;
            }
            if (hop >= MAX_REDIRECTS) {
                throw new TooManyRedirectsError(request.url);
            }

            logger.debug(`Following ${response.status} redirect from ${url.href} to ${target.href}`);
            if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === "POST")) {
                method = "GET";
                body = undefined;
            }
            if (target.origin !== url.origin) {
                headers = withoutHeader(headers, "authorization");
            }
            url = target;
        }
    }

    async close(): Promise<void> {
        await this.dispatcher.close();
    }

    private async dispatch(
        url: URL,
        method: Dispatcher.HttpMethod,
        headers: Record<string, string>,
        body: HttpRequest["body"]
    ): Promise<HttpResponse> {
        const response = await this.dispatcher.request({
            origin: url.origin,
            path: `${url.pathname}${url.search}`,
            method,
            headers,
            body,
        });

        return {
            status: response.statusCode,
            url: url.href,
            headers: response.headers,
            body: await response.body.text(),
        };
    }

    private redirectTarget(response: HttpResponse, from: URL): URL | null {
        if (!this.settings.followRedirects || !REDIRECT_STATUSES.has(response.status)) {
            return null;
        }
        const location = response.headers["location"];
        if (typeof location !== "string" || !location) {
            return null;
        }

        const target = new URL(location, from);
        if (target.protocol !== from.protocol && !this.settings.followSslRedirects) {
            return null;
        }
        return target;
    }
}

function withoutHeader(headers: Record<string, string>, name: string): Record<string, string> {
    return Object.fromEntries(
        Object.entries(headers).filter(([key]) => key.toLowerCase() !== name)
    );
}
