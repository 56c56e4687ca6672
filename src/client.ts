import { ConfigError } from "./errors.js";
import { RequestExecutor } from "./executor.js";
import { createConsoleLogger, isLogLevel, type Logger } from "./logger.js";
import { Reference, type ReferenceContext } from "./references.js";
import {
    DEFAULT_REDIRECT_LIMIT,
    DEFAULT_TIMEOUT_MS,
    FetchTransport,
    RedirectPolicy,
    type Transport,
} from "./transport.js";
import type { DatabaseOptions, Serializer } from "./types.js";
import { sanitizeUrl } from "./url.js";

const jsonSerializer: Serializer = {
    stringify: (value) => JSON.stringify(value),
    parse: (text) => JSON.parse(text),
};

type EnvLike = Record<string, string | undefined>;

/**
 * Entry point for one Realtime Database instance.
 *
 * @example
 * ```ts
 * const db = new Database("my-app-default-rtdb.firebaseio.com", {
 *     auth: process.env.FIREBASE_DATABASE_AUTH,
 * });
 * const users = db.ref("users");
 * const alice = await users.push({ name: "Alice" });
 * ```
 */
export class Database {
    /** Normalized database address. */
    readonly url: string;
    readonly timeoutMs: number;
    readonly redirectLimit: number;
    readonly transport: Transport;
    readonly logger: Logger;
    private readonly auth: string | undefined;
    private readonly context: ReferenceContext;

    constructor(url: string, options: DatabaseOptions = {}) {
        this.url = sanitizeUrl(url);
        this.auth = options.auth;
        this.timeoutMs = positive(
            "timeoutMs",
            options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        );
        this.redirectLimit = positive(
            "redirectLimit",
            options.redirectLimit ?? DEFAULT_REDIRECT_LIMIT,
        );
        this.logger = options.logger ?? createConsoleLogger(options.logLevel);
        this.transport =
            options.transport ??
            new FetchTransport({
                fetch: options.fetch,
                timeoutMs: this.timeoutMs,
                redirect: new RedirectPolicy(this.redirectLimit),
            });
        this.context = {
            executor: new RequestExecutor(this.transport, this.logger),
            serializer: options.serializer ?? jsonSerializer,
            logger: this.logger,
        };
    }

    /**
     * Builds a database from environment variables:
     *
     * - `FIREBASE_DATABASE_URL` (required)
     * - `FIREBASE_DATABASE_AUTH`
     * - `FIREBASE_TIMEOUT_MS`
     * - `FIREBASE_LOG_LEVEL`
     *
     * Values in `options` win over the environment.
     */
    static fromEnv(
        env: EnvLike = process.env,
        options: DatabaseOptions = {},
    ): Database {
        const url = env.FIREBASE_DATABASE_URL?.trim();
        if (!url) {
            throw new ConfigError("FIREBASE_DATABASE_URL is not set");
        }

        const fromEnv: DatabaseOptions = {};
        const auth = env.FIREBASE_DATABASE_AUTH?.trim();
        if (auth) fromEnv.auth = auth;

        const timeout = env.FIREBASE_TIMEOUT_MS?.trim();
        if (timeout) {
            const ms = Number(timeout);
            if (!Number.isFinite(ms) || ms <= 0) {
                throw new ConfigError(
                    `FIREBASE_TIMEOUT_MS must be a positive number, got "${timeout}"`,
                );
            }
            fromEnv.timeoutMs = ms;
        }

        const level = env.FIREBASE_LOG_LEVEL?.trim();
        if (level) {
            if (!isLogLevel(level)) {
                throw new ConfigError(`unknown FIREBASE_LOG_LEVEL "${level}"`);
            }
            fromEnv.logLevel = level;
        }

        return new Database(url, { ...fromEnv, ...options });
    }

    /** A reference to `path`, or to the root when omitted. */
    ref(path = ""): Reference {
        const root = new Reference(this.context, this.url);
        if (this.auth) root.auth(this.auth);
        return path ? root.ref(path) : root;
    }
}

function positive(name: string, value: number): number {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive number, got ${value}`);
    }
    return value;
}
