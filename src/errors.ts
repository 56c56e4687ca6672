/**
 * Error kinds raised by the client.
 *
 * Every failure surfaced to a caller is a {@link DatabaseError} carrying a
 * `kind` tag, so callers can branch on the tag instead of inspecting
 * whatever shape the transport happened to throw.
 */

export type DatabaseErrorKind =
    | "timeout"
    | "network"
    | "redirect-limit"
    | "remote-rejected"
    | "decode"
    | "encode"
    | "stream-terminated"
    | "stream-active"
    | "config";

export abstract class DatabaseError extends Error {
    abstract readonly kind: DatabaseErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The connect or header deadline expired before the server answered. */
export class TimeoutError extends DatabaseError {
    readonly kind = "timeout";

    constructor(message = "request timed out", options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Any other connection-level failure. */
export class NetworkError extends DatabaseError {
    readonly kind = "network";
}

export class RedirectLimitError extends DatabaseError {
    readonly kind = "redirect-limit";

    constructor(readonly hops: number) {
        super(`${hops} consecutive requests (redirects)`);
    }
}

/**
 * The server answered with a status outside 2xx. The service puts its error
 * message in the body, so the body text is kept verbatim as the message.
 */
export class RemoteRejectedError extends DatabaseError {
    readonly kind = "remote-rejected";

    constructor(
        readonly status: number,
        readonly body: string,
    ) {
        super(body);
    }
}

export class DecodeError extends DatabaseError {
    readonly kind = "decode";
}

export class EncodeError extends DatabaseError {
    readonly kind = "encode";
}

export type StreamTerminationReason =
    | "cancel"
    | "auth_revoked"
    | "closed"
    | "stopped";

/**
 * A streaming session ended by the server, by a closed connection, or by a
 * `stop()` that arrived before the stream was open.
 */
export class StreamTerminatedError extends DatabaseError {
    readonly kind = "stream-terminated";

    constructor(
        readonly reason: StreamTerminationReason,
        options?: { cause?: unknown },
    ) {
        super(`event stream terminated: ${reason}`, options);
    }
}

export class StreamActiveError extends DatabaseError {
    readonly kind = "stream-active";

    constructor() {
        super("reference is already watching");
    }
}

export class ConfigError extends DatabaseError {
    readonly kind = "config";
}

type DatabaseErrorOf<K extends DatabaseErrorKind> = DatabaseError & {
    kind: K;
};

export function isDatabaseError(value: unknown): value is DatabaseError;
export function isDatabaseError<K extends DatabaseErrorKind>(
    value: unknown,
    kind: K,
): value is DatabaseErrorOf<K>;
export function isDatabaseError(
    value: unknown,
    kind?: DatabaseErrorKind,
): boolean {
    return (
        value instanceof DatabaseError &&
        (kind === undefined || value.kind === kind)
    );
}

const TIMEOUT_CODES = new Set([
    "ETIMEDOUT",
    "ESOCKETTIMEDOUT",
    "UND_ERR_CONNECT_TIMEOUT",
    "UND_ERR_HEADERS_TIMEOUT",
    "UND_ERR_BODY_TIMEOUT",
]);

function fieldOf(value: unknown, field: string): unknown {
    if (typeof value !== "object" || value === null) {
        return undefined;
    }
    return Reflect.get(value, field);
}

/** True when the value itself reports a network-level timeout. */
function isNetworkTimeout(value: unknown): boolean {
    if (fieldOf(value, "name") === "TimeoutError") {
        return true;
    }
    const code = fieldOf(value, "code");
    return typeof code === "string" && TIMEOUT_CODES.has(code);
}

/**
 * Normalizes anything a transport threw into a {@link DatabaseError}.
 *
 * Timeouts show up in three ways: wrapped as the `cause` of a generic fetch
 * failure, as a network error value carrying a timeout code, or as the
 * `TimeoutError` the transport raises when its header deadline expires.
 * All three become {@link TimeoutError}.
 */
export function classifyTransportError(error: unknown): DatabaseError {
    if (error instanceof DatabaseError) {
        return error;
    }
    if (isNetworkTimeout(fieldOf(error, "cause")) || isNetworkTimeout(error)) {
        return new TimeoutError(undefined, { cause: error });
    }
    const message =
        error instanceof Error ? error.message : String(error ?? "unknown");
    return new NetworkError(message, { cause: error });
}
