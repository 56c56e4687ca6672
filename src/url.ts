import type { QueryParam, QueryValue } from "./types.js";

export type QueryParams = Map<QueryParam, string>;

/**
 * Normalizes a database address: assumes `https://` when no scheme is given
 * and drops a trailing slash.
 */
export function sanitizeUrl(url: string): string {
    let out = url;
    if (!out.startsWith("https://") && !out.startsWith("http://")) {
        out = `https://${out}`;
    }
    if (out.endsWith("/")) {
        out = out.slice(0, -1);
    }
    return out;
}

/**
 * Normalizes a path segment so that joining never doubles separators.
 *
 * `/foo/.json` → `foo`, `bar/baz/` → `bar/baz`.
 */
export function sanitizePath(path: string): string {
    let out = path.replace(/^\/+|\/+$/g, "");
    if (out.endsWith(".json")) {
        out = out.slice(0, -".json".length);
    }
    if (out.endsWith("/")) {
        out = out.slice(0, -1);
    }
    return out;
}

export function joinPath(address: string, path: string): string {
    const segment = sanitizePath(path);
    return segment ? `${address}/${segment}` : address;
}

/** Parameters sorted by name and form-encoded. */
export function encodeQuery(params: QueryParams): string {
    const search = new URLSearchParams();
    for (const name of [...params.keys()].sort()) {
        const value = params.get(name);
        if (value !== undefined) {
            search.append(name, value);
        }
    }
    return search.toString();
}

/** Renders `<address>/.json[?<params>]`. */
export function renderUrl(address: string, params: QueryParams): string {
    const url = `${address}/.json`;
    return params.size > 0 ? `${url}?${encodeQuery(params)}` : url;
}

/**
 * The REST dialect expects `orderBy`, `startAt`, `endAt` and `equalTo` to be
 * JSON literals: strings quoted, numbers and booleans bare.
 */
export function encodeQueryValue(value: QueryValue): string {
    if (typeof value === "number" && !Number.isFinite(value)) {
        throw new RangeError(`query value must be finite, got ${value}`);
    }
    return JSON.stringify(value);
}
