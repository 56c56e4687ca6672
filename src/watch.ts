import {
    classifyTransportError,
    RemoteRejectedError,
    StreamActiveError,
    StreamTerminatedError,
    type DatabaseError,
} from "./errors.js";
import {
    ChangeMapper,
    EventStreamDecoder,
    type EventFrame,
} from "./event-stream.js";
import type { RequestExecutor } from "./executor.js";
import { ListenerRegistry } from "./listeners.js";
import { redactUrl, type Logger } from "./logger.js";
import type { WatchState } from "./types.js";
import type { ReadableStreamDefaultReader } from "node:stream/web";

type StreamReader = ReadableStreamDefaultReader<Uint8Array>;

/**
 * Streaming session of one reference: `idle → connecting → streaming`,
 * ending in `idle` when stopped or `failed` when the connection or the
 * server ends it. At most one connection is open at a time.
 *
 * Registrations belong to a session. `stop()` and a failure both release
 * them, so the next `start()` delivers only to listeners added after that.
 */
export class Watch {
    readonly listeners: ListenerRegistry;
    private readonly mapper: ChangeMapper;
    private state: WatchState = "idle";
    private session = 0;
    private controller: AbortController | undefined;
    private reader: StreamReader | undefined;
    private loop: Promise<void> | undefined;

    constructor(
        private readonly executor: RequestExecutor,
        private readonly logger: Logger,
    ) {
        this.listeners = new ListenerRegistry(logger);
        this.mapper = new ChangeMapper(logger);
    }

    get status(): WatchState {
        return this.state;
    }

    get active(): boolean {
        return this.state === "connecting" || this.state === "streaming";
    }

    /**
     * Opens the event stream at `url`. Resolves once the server has answered
     * with 2xx; events then arrive in the background.
     *
     * @throws {StreamActiveError} when a session is connecting or streaming
     */
    async start(url: string): Promise<void> {
        if (this.active) {
            throw new StreamActiveError();
        }
        // Claim the session before the first await so a concurrent start
        // sees it as active.
        const session = ++this.session;
        const controller = new AbortController();
        this.state = "connecting";
        this.controller = controller;
        this.reader = undefined;
        this.mapper.reset();

        let response: Response;
        try {
            response = await this.executor.open("GET", url, {
                headers: { Accept: "text/event-stream" },
                signal: controller.signal,
            });
        } catch (error) {
            throw this.abandon(session, classifyTransportError(error));
        }

        if (response.status < 200 || response.status > 299) {
            let body: string;
            try {
                body = await response.text();
            } catch (error) {
                throw this.abandon(session, classifyTransportError(error));
            }
            throw this.abandon(
                session,
                new RemoteRejectedError(response.status, body),
            );
        }
        if (!response.body) {
            throw this.abandon(session, new StreamTerminatedError("closed"));
        }
        if (session !== this.session) {
            // Stopped while connecting; the abort may already have errored
            // the body.
            try {
                await response.body.cancel();
            } catch (error) {
                this.logger.debug("closing event stream failed", {
                    message:
                        error instanceof Error ? error.message : String(error),
                });
            }
            throw new StreamTerminatedError("stopped");
        }

        this.state = "streaming";
        this.logger.debug(`watching ${redactUrl(url)}`);
        const reader = response.body.getReader();
        this.reader = reader;
        this.loop = this.read(session, reader);
    }

    /**
     * Ends the session, closes the connection and releases every
     * registration. Resolves when the read loop has exited.
     */
    async stop(): Promise<void> {
        this.session++;
        this.state = "idle";
        this.release();
        this.listeners.clear();
        await this.loop;
    }

    private async read(session: number, reader: StreamReader): Promise<void> {
        const text = new TextDecoder();
        const frames = new EventStreamDecoder();
        try {
            for (;;) {
                const { done, value } = await reader.read();
                if (session !== this.session) return;
                if (done) {
                    if (this.dispatch(session, frames.end())) return;
                    this.fail(session, new StreamTerminatedError("closed"));
                    return;
                }
                const chunk = text.decode(value, { stream: true });
                if (this.dispatch(session, frames.push(chunk))) return;
            }
        } catch (error) {
            if (session !== this.session) return;
            this.fail(session, classifyTransportError(error));
        }
    }

    /** Publishes decoded frames; true when one of them ended the session. */
    private dispatch(session: number, frames: EventFrame[]): boolean {
        for (const frame of frames) {
            for (const event of this.mapper.map(frame)) {
                this.listeners.publish(event);
                if (event.type === "cancel" || event.type === "auth_revoked") {
                    this.fail(session, new StreamTerminatedError(event.type));
                    return true;
                }
            }
        }
        return false;
    }

    private fail(session: number, error: DatabaseError): void {
        if (session !== this.session) return;
        this.session++;
        this.state = "failed";
        this.release();
        this.logger.warn("event stream ended", {
            kind: error.kind,
            message: error.message,
        });
        this.listeners.fail(error);
    }

    /** Undoes a start that never reached `streaming`. */
    private abandon(session: number, error: DatabaseError): DatabaseError {
        if (session === this.session) {
            this.state = "idle";
            this.controller = undefined;
            return error;
        }
        return new StreamTerminatedError("stopped", { cause: error });
    }

    private release(): void {
        this.controller?.abort();
        this.controller = undefined;
        const reader = this.reader;
        this.reader = undefined;
        reader?.cancel().catch((error: unknown) => {
            this.logger.debug("closing event stream failed", {
                message: error instanceof Error ? error.message : String(error),
            });
        });
    }
}
