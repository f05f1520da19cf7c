/**
 * undici connector carrying the client's TLS and timeout settings.
 */
import { buildConnector } from "undici";
import { ClientSettings } from "./types";

export class SocketInactivityError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Socket inactive for ${timeoutMs} ms`);
        this.name = "SocketInactivityError";
    }
}

export function createConnector(settings: ClientSettings): buildConnector.connector {
    const connector = buildConnector({
        timeout: settings.timeouts.connectMs,
        checkServerIdentity: settings.hostnameVerifier,
        ...(settings.tls
            ? {
                secureContext: settings.tls.socketFactory.secureContext,
                rejectUnauthorized: settings.tls.trustManager.verifiesChain,
            }
            : {}),
    });
    return withInactivityTimeout(connector, settings.timeouts.writeMs);
}

// undici has no write timeout; a stalled socket is torn down instead
function withInactivityTimeout(connector: buildConnector.connector, timeoutMs: number): buildConnector.connector {
    return (options, callback) => {
        connector(options, (error, socket) => {
            if (error !== null || socket === null) {
                callback(error ?? new Error("Connector returned neither a socket nor an error"), null);
                return;
            }
            socket.setTimeout(timeoutMs, () => {
                socket.destroy(new SocketInactivityError(timeoutMs));
            });
            callback(null, socket);
        });
    };
}
