import { RedirectLimitError } from "./errors.js";
import type { HttpMethod } from "./types.js";

export interface TransportRequest {
    method: HttpMethod;
    url: string;
    headers: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
}

/**
 * Anything that can carry one HTTP exchange. Implementations resolve with
 * the final response (redirects already followed) or reject with whatever
 * their network layer produced; the executor classifies it.
 */
export interface Transport {
    send(request: TransportRequest): Promise<Response>;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export const DEFAULT_REDIRECT_LIMIT = 30;
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Follows redirects while copying the original request's headers onto every
 * hop. 307 and 308 keep method and body; other redirects of a non-GET become
 * a body-less GET.
 */
export class RedirectPolicy {
    constructor(readonly limit: number = DEFAULT_REDIRECT_LIMIT) {}

    isRedirect(response: Response): boolean {
        return (
            REDIRECT_STATUSES.has(response.status) &&
            response.headers.has("location")
        );
    }

    /**
     * Builds the request for redirect number `hops` (1-based) of a chain
     * that started with `original`.
     */
    next(
        original: TransportRequest,
        current: TransportRequest,
        response: Response,
        hops: number,
    ): TransportRequest {
        if (hops > this.limit) {
            throw new RedirectLimitError(hops);
        }
        const location = response.headers.get("location") ?? "";
        const url = new URL(location, current.url).toString();
        const keepMethod = response.status === 307 || response.status === 308;

        if (keepMethod || current.method === "GET") {
            return { ...current, url, headers: { ...original.headers } };
        }
        return {
            method: "GET",
            url,
            headers: { ...original.headers },
            signal: current.signal,
        };
    }
}

export interface FetchTransportOptions {
    fetch?: typeof fetch;
    /** Deadline for connect and header receipt across the redirect chain. */
    timeoutMs?: number;
    redirect?: RedirectPolicy;
}

/** {@link Transport} over the global `fetch`. */
export class FetchTransport implements Transport {
    private readonly fetch: typeof fetch;
    readonly timeoutMs: number;
    readonly redirect: RedirectPolicy;

    constructor(options: FetchTransportOptions = {}) {
        this.fetch = options.fetch ?? globalThis.fetch;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.redirect = options.redirect ?? new RedirectPolicy();
    }

    async send(request: TransportRequest): Promise<Response> {
        const controller = new AbortController();
        const timer = setTimeout(() => {
            controller.abort(
                new DOMException(
                    `no response headers within ${this.timeoutMs}ms`,
                    "TimeoutError",
                ),
            );
        }, this.timeoutMs);

        const upstream = request.signal;
        const forward = () => controller.abort(upstream?.reason);
        if (upstream?.aborted) {
            forward();
        } else {
            upstream?.addEventListener("abort", forward, { once: true });
        }

        try {
            let current: TransportRequest = request;
            for (let hops = 1; ; hops++) {
                const response = await this.fetch(current.url, {
                    method: current.method,
                    headers: current.headers,
                    body: current.body,
                    redirect: "manual",
                    signal: controller.signal,
                });
                if (!this.redirect.isRedirect(response)) {
                    return response;
                }
                await response.body?.cancel();
                current = this.redirect.next(request, current, response, hops);
            }
        } catch (error) {
            upstream?.removeEventListener("abort", forward);
            // fetch rejects with the abort reason; keep the deadline visible
            // even when an implementation reports a plain AbortError.
            const reason: unknown = controller.signal.reason;
            if (
                reason instanceof DOMException &&
                reason.name === "TimeoutError"
            ) {
                throw reason;
            }
            throw error;
        } finally {
            // The caller's signal stays linked so aborting it also tears
            // down a body that is still being read.
            clearTimeout(timer);
        }
    }
}
