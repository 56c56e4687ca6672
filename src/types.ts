import type { Logger, LogLevel } from "./logger.js";
import type { Transport } from "./transport.js";

export type HttpMethod = "GET" | "PUT" | "POST" | "PATCH" | "DELETE";

/** A value the REST dialect accepts for `startAt`, `endAt` and `equalTo`. */
export type QueryValue = string | number | boolean | null;

/** Query parameters understood by the REST interface. */
export type QueryParam =
    | "auth"
    | "format"
    | "shallow"
    | "orderBy"
    | "startAt"
    | "endAt"
    | "equalTo"
    | "limitToFirst"
    | "limitToLast";

export interface Serializer {
    /** Returns `undefined` for values that cannot be represented. */
    stringify(value: unknown): string | undefined;
    parse(text: string): unknown;
}

export interface DatabaseOptions {
    /** Token or database secret forwarded as the `auth` query parameter. */
    auth?: string;
    /** Deadline for connect and header receipt, in milliseconds. @default 30000 */
    timeoutMs?: number;
    /** Maximum redirect hops before a request fails. @default 30 */
    redirectLimit?: number;
    /** Replaces the default fetch-backed transport. */
    transport?: Transport;
    /** `fetch` used by the default transport. */
    fetch?: typeof fetch;
    serializer?: Serializer;
    logger?: Logger;
    /** Level for the default console logger. Ignored when `logger` is set. */
    logLevel?: LogLevel;
}

export type ChangeEventType =
    | "value"
    | "child_added"
    | "child_changed"
    | "child_removed"
    | "child_moved"
    | "keep-alive"
    | "cancel"
    | "auth_revoked";

/**
 * A change below a watched reference.
 *
 * `data` always belongs to `path`: the value written there, or for a patch
 * the merged keys relative to it. Child events name the immediate child
 * they concern by the first segment of `path`, which is longer than one
 * segment when the write landed deeper.
 */
export interface ChangeEvent {
    type: ChangeEventType;
    /** Slash-prefixed path relative to the watched reference. */
    path: string;
    data: unknown;
}

export type ChangeListener = (event: ChangeEvent) => void | Promise<void>;
export type ErrorListener = (error: Error) => void | Promise<void>;

export interface ListenerHandle {
    readonly type: ChangeEventType | "*";
    /** Removes this registration only. Calling it twice is harmless. */
    off(): void;
}

export type WatchState = "idle" | "connecting" | "streaming" | "failed";
