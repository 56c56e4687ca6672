import { classifyTransportError, RemoteRejectedError } from "./errors.js";
import { redactUrl, type Logger } from "./logger.js";
import type { Transport, TransportRequest } from "./transport.js";
import type { HttpMethod } from "./types.js";

export interface ExecuteOptions {
    body?: string;
    headers?: Record<string, string>;
    signal?: AbortSignal;
}

/**
 * Runs one request/response cycle and turns every failure into a tagged
 * error. Nothing is retried here.
 */
export class RequestExecutor {
    constructor(
        private readonly transport: Transport,
        private readonly logger: Logger,
    ) {}

    /**
     * Sends the request and resolves with the response, body unread. Only
     * transport failures are classified; the status is left to the caller.
     */
    async open(
        method: HttpMethod,
        url: string,
        options: ExecuteOptions = {},
    ): Promise<Response> {
        const headers: Record<string, string> = { ...options.headers };
        if (options.body !== undefined) {
            headers["Content-Type"] = "application/json";
        }
        const request: TransportRequest = {
            method,
            url,
            headers,
            body: options.body,
            signal: options.signal,
        };

        try {
            return await this.transport.send(request);
        } catch (error) {
            const classified = classifyTransportError(error);
            this.logger.debug(`${method} ${redactUrl(url)} failed`, {
                kind: classified.kind,
                message: classified.message,
            });
            throw classified;
        }
    }

    /** Resolves with the body text of a 2xx response. */
    async execute(
        method: HttpMethod,
        url: string,
        options: ExecuteOptions = {},
    ): Promise<string> {
        const response = await this.open(method, url, options);

        let text: string;
        try {
            text = await response.text();
        } catch (error) {
            throw classifyTransportError(error);
        }

        this.logger.debug(`${method} ${redactUrl(url)} ${response.status}`);
        if (response.status < 200 || response.status > 299) {
            throw new RemoteRejectedError(response.status, text);
        }
        return text;
    }
}
