import { z } from "zod";
import { DecodeError, EncodeError } from "./errors.js";
import type { RequestExecutor } from "./executor.js";
import type { Logger } from "./logger.js";
import type {
    ChangeEventType,
    ChangeListener,
    ErrorListener,
    HttpMethod,
    ListenerHandle,
    QueryParam,
    QueryValue,
    Serializer,
    WatchState,
} from "./types.js";
import {
    encodeQueryValue,
    joinPath,
    renderUrl,
    sanitizePath,
    type QueryParams,
} from "./url.js";
import { Watch } from "./watch.js";

/** What every reference of one database shares. */
export interface ReferenceContext {
    executor: RequestExecutor;
    serializer: Serializer;
    logger: Logger;
}

/** A zod schema that produces `T`, whatever its input type. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const pushResult = z.object({ name: z.string().min(1) });

/**
 * A location in the database tree.
 *
 * The address is fixed at construction. Query configuration is private to
 * each reference: deriving one copies it, so changing the copy leaves the
 * original untouched. The transport is shared by every reference of a
 * {@link Database}.
 */
export class Reference {
    private readonly watcher: Watch;

    /** @internal Use `Database.ref()` or `child()`. */
    constructor(
        private readonly context: ReferenceContext,
        private readonly root: string,
        /** Path below the database root, without leading or trailing `/`. */
        readonly path: string = "",
        private readonly query: QueryParams = new Map(),
    ) {
        this.watcher = new Watch(context.executor, context.logger);
    }

    /** The last path segment, or `null` at the root. */
    get key(): string | null {
        if (!this.path) return null;
        return this.path.slice(this.path.lastIndexOf("/") + 1);
    }

    /** The reference one level up, or `null` at the root. */
    get parent(): Reference | null {
        if (!this.path) return null;
        const cut = this.path.lastIndexOf("/");
        return this.derive(cut === -1 ? "" : this.path.slice(0, cut));
    }

    /** Rendered request URL: `<address>/.json[?<params>]`. */
    get url(): string {
        return renderUrl(joinPath(this.root, this.path), this.query);
    }

    toString(): string {
        return this.url;
    }

    /** A reference to `path` below this one, sharing its configuration. */
    child(path: string): Reference {
        const segment = sanitizePath(path);
        if (!segment) return this.derive(this.path);
        return this.derive(this.path ? `${this.path}/${segment}` : segment);
    }

    /** A reference to `path` measured from the database root. */
    ref(path: string): Reference {
        return this.derive(sanitizePath(path));
    }

    /** Snapshot of the query parameters currently set. */
    params(): Partial<Record<QueryParam, string>> {
        const out: Partial<Record<QueryParam, string>> = {};
        for (const [name, value] of this.query) {
            out[name] = value;
        }
        return out;
    }

    // Configuration of this reference. These change this reference only.

    auth(token: string): void {
        this.query.set("auth", token);
    }

    unauth(): void {
        this.query.delete("auth");
    }

    /** Reads return only the immediate child keys, with `true` for objects. */
    shallow(enabled: boolean): void {
        this.toggle("shallow", enabled ? "true" : undefined);
    }

    /** Reads include priorities (`format=export`). */
    includePriority(enabled: boolean): void {
        this.toggle("format", enabled ? "export" : undefined);
    }

    // Query builders. Each returns a new reference.

    orderBy(child: string): Reference {
        return this.with("orderBy", encodeQueryValue(child));
    }

    orderByKey(): Reference {
        return this.orderBy("$key");
    }

    orderByValue(): Reference {
        return this.orderBy("$value");
    }

    orderByPriority(): Reference {
        return this.orderBy("$priority");
    }

    startAt(value: QueryValue): Reference {
        return this.with("startAt", encodeQueryValue(value));
    }

    endAt(value: QueryValue): Reference {
        return this.with("endAt", encodeQueryValue(value));
    }

    equalTo(value: QueryValue): Reference {
        return this.with("equalTo", encodeQueryValue(value));
    }

    limitToFirst(limit: number): Reference {
        return this.with("limitToFirst", String(checkLimit(limit)));
    }

    limitToLast(limit: number): Reference {
        return this.with("limitToLast", String(checkLimit(limit)));
    }

    // CRUD

    /**
     * Reads the value at this location. With a schema, the decoded value is
     * validated and returned typed; without one it is returned as parsed.
     *
     * @throws {DecodeError} when the body does not parse or match `schema`
     */
    get(): Promise<unknown>;
    get<T>(schema: Schema<T>): Promise<T>;
    async get<T>(schema?: Schema<T>): Promise<unknown> {
        const value = this.decode(await this.request("GET"));
        return schema ? validate(schema, value) : value;
    }

    /** Replaces the whole subtree at this location. */
    async set(value: unknown): Promise<void> {
        await this.request("PUT", this.encode(value));
    }

    /** Merges `values` into the subtree, leaving other children as they are. */
    async update(values: Record<string, unknown>): Promise<void> {
        await this.request("PATCH", this.encode(values));
    }

    /**
     * Appends `value` under a server-generated, chronologically ordered key.
     *
     * @returns a reference to the new child
     */
    async push(value: unknown): Promise<Reference> {
        const text = await this.request("POST", this.encode(value));
        const { name } = validate(pushResult, this.decode(text));
        return this.child(name);
    }

    async remove(): Promise<void> {
        await this.request("DELETE");
    }

    /** Names of the immediate children, via a shallow read. */
    async keys(): Promise<string[]> {
        const copy = this.derive(this.path);
        copy.shallow(true);
        const value = await copy.get();
        if (typeof value !== "object" || value === null) {
            return [];
        }
        return Object.keys(value).sort();
    }

    /** Reads the value together with its priority metadata. */
    exportValue(): Promise<unknown>;
    exportValue<T>(schema: Schema<T>): Promise<T>;
    async exportValue<T>(schema?: Schema<T>): Promise<unknown> {
        const copy = this.derive(this.path);
        copy.includePriority(true);
        return schema ? copy.get(schema) : copy.get();
    }

    // Streaming

    get watchState(): WatchState {
        return this.watcher.status;
    }

    get isWatching(): boolean {
        return this.watcher.active;
    }

    /**
     * Opens the change stream for this location. Listeners may be added
     * before or after. Resolves once the server accepted the stream.
     *
     * @throws {StreamActiveError} when this reference is already watching
     */
    async watch(): Promise<void> {
        await this.watcher.start(this.url);
    }

    /**
     * Closes the change stream and drops every listener of the session.
     */
    async stopWatching(): Promise<void> {
        await this.watcher.stop();
    }

    /**
     * Registers `listener` for events of `type` (`"*"` for all). The
     * optional `onError` receives the error that ends the session.
     */
    on(
        type: ChangeEventType | "*",
        listener: ChangeListener,
        onError?: ErrorListener,
    ): ListenerHandle {
        return this.watcher.listeners.add(type, listener, onError);
    }

    off(handle: ListenerHandle): void {
        handle.off();
    }

    onValue(listener: ChangeListener, onError?: ErrorListener): ListenerHandle {
        return this.on("value", listener, onError);
    }

    onChildAdded(
        listener: ChangeListener,
        onError?: ErrorListener,
    ): ListenerHandle {
        return this.on("child_added", listener, onError);
    }

    onChildChanged(
        listener: ChangeListener,
        onError?: ErrorListener,
    ): ListenerHandle {
        return this.on("child_changed", listener, onError);
    }

    onChildRemoved(
        listener: ChangeListener,
        onError?: ErrorListener,
    ): ListenerHandle {
        return this.on("child_removed", listener, onError);
    }

    /**
     * Resolves once every listener has been handed what was published so far.
     *
     * @internal
     */
    async settled(): Promise<void> {
        await this.watcher.listeners.settled();
    }

    private derive(path: string): Reference {
        return new Reference(this.context, this.root, path, new Map(this.query));
    }

    private with(name: QueryParam, value: string): Reference {
        const copy = this.derive(this.path);
        copy.query.set(name, value);
        return copy;
    }

    private toggle(name: QueryParam, value: string | undefined): void {
        if (value === undefined) {
            this.query.delete(name);
        } else {
            this.query.set(name, value);
        }
    }

    private request(method: HttpMethod, body?: string): Promise<string> {
        return this.context.executor.execute(method, this.url, { body });
    }

    private encode(value: unknown): string {
        let text: string | undefined;
        try {
            text = this.context.serializer.stringify(value);
        } catch (error) {
            throw new EncodeError("value could not be serialized", {
                cause: error,
            });
        }
        if (text === undefined) {
            throw new EncodeError(
                `cannot serialize a value of type ${typeof value}`,
            );
        }
        return text;
    }

    private decode(text: string): unknown {
        try {
            return this.context.serializer.parse(text);
        } catch (error) {
            throw new DecodeError("response body is not valid JSON", {
                cause: error,
            });
        }
    }
}

function validate<T>(schema: Schema<T>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
        );
        throw new DecodeError(`unexpected response shape: ${issues.join("; ")}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

function checkLimit(limit: number): number {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    return limit;
}
