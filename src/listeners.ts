import type { Logger } from "./logger.js";
import type {
    ChangeEvent,
    ChangeEventType,
    ChangeListener,
    ErrorListener,
    ListenerHandle,
} from "./types.js";

type Delivery =
    | { kind: "event"; event: ChangeEvent }
    | { kind: "error"; error: Error };

interface Registration {
    type: ChangeEventType | "*";
    listener: ChangeListener;
    onError?: ErrorListener;
    queue: Delivery[];
    active: boolean;
    draining?: Promise<void>;
}

/**
 * Listener registrations of one reference.
 *
 * Each registration owns a FIFO queue that is drained on its own async
 * task, awaiting the listener before handing it the next item. Publishing
 * only enqueues, so a listener that takes its time holds up nobody else.
 */
export class ListenerRegistry {
    private readonly registrations = new Set<Registration>();
    private readonly draining = new Set<Registration>();

    constructor(private readonly logger: Logger) {}

    get size(): number {
        return this.registrations.size;
    }

    add(
        type: ChangeEventType | "*",
        listener: ChangeListener,
        onError?: ErrorListener,
    ): ListenerHandle {
        const registration: Registration = {
            type,
            listener,
            onError,
            queue: [],
            active: true,
        };
        this.registrations.add(registration);

        return {
            type,
            off: () => {
                registration.active = false;
                registration.queue.length = 0;
                this.registrations.delete(registration);
            },
        };
    }

    publish(event: ChangeEvent): void {
        for (const registration of this.registrations) {
            if (registration.type === "*" || registration.type === event.type) {
                this.enqueue(registration, { kind: "event", event });
            }
        }
    }

    /**
     * Queues a terminal error behind whatever is still pending and releases
     * every registration. Nothing published afterwards reaches them.
     */
    fail(error: Error): void {
        for (const registration of this.registrations) {
            this.enqueue(registration, { kind: "error", error });
        }
        this.registrations.clear();
    }

    /** Releases every registration and discards undelivered items. */
    clear(): void {
        for (const registration of this.registrations) {
            registration.active = false;
            registration.queue.length = 0;
        }
        this.registrations.clear();
    }

    /** Resolves once every queue that is currently draining is empty. */
    async settled(): Promise<void> {
        const pending: Promise<void>[] = [];
        for (const registration of this.draining) {
            if (registration.draining) pending.push(registration.draining);
        }
        await Promise.all(pending);
    }

    private enqueue(registration: Registration, item: Delivery): void {
        registration.queue.push(item);
        if (!registration.draining) {
            this.draining.add(registration);
            registration.draining = this.drain(registration);
        }
    }

    private async drain(registration: Registration): Promise<void> {
        // Never run listener code on the publisher's stack.
        await Promise.resolve();

        while (registration.active && registration.queue.length > 0) {
            const item = registration.queue.shift();
            if (!item) break;
            try {
                if (item.kind === "event") {
                    await registration.listener(item.event);
                } else {
                    await registration.onError?.(item.error);
                }
            } catch (error) {
                this.logger.error("listener threw", {
                    type: registration.type,
                    message:
                        error instanceof Error ? error.message : String(error),
                });
            }
        }

        registration.draining = undefined;
        this.draining.delete(registration);
    }
}
