import { z } from "zod";
import type { Logger } from "./logger.js";
import type { ChangeEvent, ChangeEventType } from "./types.js";

/** One `event:` / `data:` unit read off the stream. */
export interface EventFrame {
    event: string;
    data: string;
}

/**
 * Incremental decoder for `text/event-stream` bodies. Feed it text as it
 * arrives; it returns the frames completed by that chunk.
 */
export class EventStreamDecoder {
    private buffer = "";
    private event: string | undefined;
    private data: string[] = [];

    push(chunk: string): EventFrame[] {
        this.buffer += chunk;
        const frames: EventFrame[] = [];

        let idx: number;
        while ((idx = this.buffer.indexOf("\n")) >= 0) {
            let line = this.buffer.slice(0, idx);
            this.buffer = this.buffer.slice(idx + 1);
            if (line.endsWith("\r")) {
                line = line.slice(0, -1);
            }

            if (line === "") {
                const frame = this.flush();
                if (frame) frames.push(frame);
                continue;
            }
            if (line.startsWith(":")) {
                continue;
            }

            const colon = line.indexOf(":");
            const field = colon === -1 ? line : line.slice(0, colon);
            let value = colon === -1 ? "" : line.slice(colon + 1);
            if (value.startsWith(" ")) {
                value = value.slice(1);
            }

            switch (field) {
                case "event":
                    this.event = value;
                    break;
                case "data":
                    this.data.push(value);
                    break;
            }
        }
        return frames;
    }

    /** Emits a frame left pending when the body ends without a blank line. */
    end(): EventFrame[] {
        const tail = this.buffer;
        this.buffer = "";
        const frames = tail ? this.push(`${tail}\n`) : [];
        const frame = this.flush();
        if (frame) frames.push(frame);
        return frames;
    }

    private flush(): EventFrame | undefined {
        const event = this.event;
        const data = this.data.join("\n");
        this.event = undefined;
        this.data = [];
        if (event === undefined) {
            return undefined;
        }
        return { event, data };
    }
}

const changePayload = z.object({
    path: z.string(),
    data: z.unknown(),
});

const PASS_THROUGH: ReadonlySet<string> = new Set<ChangeEventType>([
    "value",
    "child_added",
    "child_changed",
    "child_removed",
    "child_moved",
]);

const CONTROL: ReadonlySet<string> = new Set<ChangeEventType>([
    "keep-alive",
    "cancel",
    "auth_revoked",
]);

function isChangeEventType(name: string): name is ChangeEventType {
    return PASS_THROUGH.has(name) || CONTROL.has(name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childKeys(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.flatMap((item, i) => (item === null ? [] : [String(i)]));
    }
    return isRecord(value) ? Object.keys(value) : [];
}

function splitPath(path: string): string[] {
    return path.split("/").filter((segment) => segment.length > 0);
}

/**
 * Turns decoded frames into {@link ChangeEvent}s.
 *
 * The service only sends `put` and `patch` for data changes, so child
 * events are derived from the set of immediate child keys seen so far.
 */
export class ChangeMapper {
    private readonly known = new Set<string>();

    constructor(private readonly logger: Logger) {}

    reset(): void {
        this.known.clear();
    }

    map(frame: EventFrame): ChangeEvent[] {
        if (frame.event === "put" || frame.event === "patch") {
            const payload = this.parsePayload(frame);
            if (!payload) return [];
            return frame.event === "put"
                ? this.put(payload.path, payload.data)
                : this.patch(payload.path, payload.data);
        }

        const name = frame.event;
        if (isChangeEventType(name)) {
            if (CONTROL.has(name)) {
                return [
                    {
                        type: name,
                        path: "/",
                        data: this.parseControlData(frame.data),
                    },
                ];
            }
            const payload = this.parsePayload(frame);
            if (!payload) return [];
            return [{ type: name, path: payload.path, data: payload.data }];
        }

        this.logger.warn(`skipping unrecognized event frame "${frame.event}"`);
        return [];
    }

    private put(path: string, data: unknown): ChangeEvent[] {
        const events: ChangeEvent[] = [{ type: "value", path, data }];
        const segments = splitPath(path);

        if (segments.length === 0) {
            this.known.clear();
            for (const key of childKeys(data)) {
                this.known.add(key);
            }
            return events;
        }

        const [key] = segments;
        const event = this.childEvent(
            key,
            { path, data },
            segments.length > 1,
            data === null,
        );
        if (event) events.push(event);
        return events;
    }

    /**
     * Child event for a write below immediate child `key`. `clears` marks a
     * write that only deletes data; below the first level that changes a
     * known child and is ignored for an unknown one.
     */
    private childEvent(
        key: string,
        write: { path: string; data: unknown },
        nested: boolean,
        clears: boolean,
    ): ChangeEvent | undefined {
        const { path, data } = write;
        if (clears) {
            if (nested) {
                return this.known.has(key)
                    ? { type: "child_changed", path, data }
                    : undefined;
            }
            return this.known.delete(key)
                ? { type: "child_removed", path, data }
                : undefined;
        }
        if (this.known.has(key)) {
            return { type: "child_changed", path, data };
        }
        this.known.add(key);
        return { type: "child_added", path, data };
    }

    private patch(path: string, data: unknown): ChangeEvent[] {
        const events: ChangeEvent[] = [{ type: "value", path, data }];
        if (!isRecord(data)) {
            return events;
        }

        const segments = splitPath(path);
        if (segments.length > 0) {
            const [key] = segments;
            const event = this.childEvent(
                key,
                { path, data },
                true,
                Object.values(data).every((value) => value === null),
            );
            if (event) events.push(event);
            return events;
        }

        // Keys of a multi-path update may reach below the first level;
        // group them by the immediate child they touch.
        const touched = new Map<string, { direct: boolean; data: unknown }>();
        for (const [name, value] of Object.entries(data)) {
            const [key, ...rest] = splitPath(name);
            if (key === undefined) continue;
            const entry = touched.get(key);
            if (rest.length === 0) {
                touched.set(key, { direct: true, data: value });
            } else if (!entry?.direct) {
                const previous = entry?.data;
                const merged: Record<string, unknown> = isRecord(previous)
                    ? previous
                    : {};
                merged[rest.join("/")] = value;
                touched.set(key, { direct: false, data: merged });
            }
        }

        for (const [key, { direct, data: value }] of touched) {
            const event = this.childEvent(
                key,
                { path: `/${key}`, data: value },
                !direct,
                direct
                    ? value === null
                    : isRecord(value) &&
                          Object.values(value).every((v) => v === null),
            );
            if (event) events.push(event);
        }
        return events;
    }

    private parsePayload(
        frame: EventFrame,
    ): z.infer<typeof changePayload> | undefined {
        const parsed = changePayload.safeParse(this.parseJson(frame));
        if (!parsed.success) {
            this.logger.warn(`skipping malformed "${frame.event}" frame`, {
                data: frame.data,
            });
            return undefined;
        }
        return parsed.data;
    }

    private parseJson(frame: EventFrame): unknown {
        try {
            return JSON.parse(frame.data);
        } catch {
            this.logger.warn(
                `skipping "${frame.event}" frame with invalid JSON`,
                { data: frame.data },
            );
            return undefined;
        }
    }

    /** Control frames may carry JSON, a bare string, or nothing. */
    private parseControlData(text: string): unknown {
        if (text === "") return null;
        try {
            return JSON.parse(text);
        } catch {
            return text;
        }
    }
}
