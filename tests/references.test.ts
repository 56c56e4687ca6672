import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import {
    createConsoleLogger,
    Database,
    DecodeError,
    EncodeError,
    isDatabaseError,
    RemoteRejectedError,
    type Serializer,
    type Transport,
} from "../src/index.js";
import { MemoryDatabase } from "./support/memory-database.js";

/** Test user type */
interface TestUser {
    name: string;
    score: number;
}

const testUser = z.object({ name: z.string(), score: z.number() });

describe("Reference CRUD", () => {
    let server: MemoryDatabase;
    let db: Database;

    beforeEach(() => {
        server = new MemoryDatabase();
        db = new Database("db.example.com", {
            transport: server,
            logger: createConsoleLogger("silent"),
        });
    });

    it("reads back what was written", async () => {
        const ref = db.ref("users/alice");
        const alice: TestUser = { name: "Alice", score: 10 };

        await ref.set(alice);

        expect(await ref.get()).toEqual(alice);
        const typed: TestUser = await ref.get(testUser);
        expect(typed).toEqual(alice);
        expect(server.requests.map((r) => r.method)).toEqual([
            "PUT",
            "GET",
            "GET",
        ]);
    });

    it("sends JSON bodies with a content type", async () => {
        await db.ref("a").set({ b: 1 });
        const [request] = server.requests;
        expect(request.body).toBe('{"b":1}');
        expect(request.headers["Content-Type"]).toBe("application/json");
        expect(request.url).toBe("https://db.example.com/a/.json");
    });

    it("returns null for a missing location", async () => {
        expect(await db.ref("nothing/here").get()).toBeNull();
    });

    it("merges keys on update", async () => {
        const ref = db.ref("doc");
        await ref.set({ a: 1, b: 2 });

        await ref.update({ b: 3 });

        expect(await ref.get()).toEqual({ a: 1, b: 3 });
        expect(server.requests[1].method).toBe("PATCH");
    });

    it("replaces the whole subtree on set", async () => {
        const ref = db.ref("doc");
        await ref.set({ a: 1, b: 2 });

        await ref.set({ b: 3 });

        expect(await ref.get()).toEqual({ b: 3 });
    });

    it("pushes under a generated key", async () => {
        const list = db.ref("messages");

        const first = await list.push({ text: "hello" });
        const second = await list.push({ text: "world" });

        expect(first.key).toBe("-M00000001");
        expect(first.url).toBe(
            "https://db.example.com/messages/-M00000001/.json",
        );
        expect(server.read(`messages/${first.key}`)).toEqual({
            text: "hello",
        });
        expect(await second.get()).toEqual({ text: "world" });
        expect(await list.keys()).toEqual(["-M00000001", "-M00000002"]);
    });

    it("keeps query configuration on pushed references", async () => {
        const list = db.ref("messages");
        list.auth("test-secret");

        const pushed = await list.push(1);

        expect(pushed.params()).toEqual({ auth: "test-secret" });
    });

    it("removes a subtree", async () => {
        await db.ref("a").set({ keep: true, drop: { x: 1 } });

        await db.ref("a/drop").remove();

        expect(server.read("a")).toEqual({ keep: true });
        expect(server.requests[1].method).toBe("DELETE");
        expect(server.requests[1].body).toBeUndefined();
    });

    it("lists child keys with a shallow read", async () => {
        server.seed("rooms", {
            lobby: { topic: "hi", members: { a: true } },
            attic: 3,
        });

        const rooms = db.ref("rooms");
        expect(await rooms.keys()).toEqual(["attic", "lobby"]);
        expect(server.requests[0].url).toBe(
            "https://db.example.com/rooms/.json?shallow=true",
        );
        // the shallow flag stays on the copy
        expect(rooms.params()).toEqual({});
    });

    it("returns placeholders from a configured shallow read", async () => {
        server.seed("rooms", { lobby: { topic: "hi" }, attic: 3 });
        const rooms = db.ref("rooms");
        rooms.shallow(true);

        expect(await rooms.get()).toEqual({ lobby: true, attic: 3 });
    });

    it("returns no keys for a primitive or missing location", async () => {
        server.seed("count", 7);
        expect(await db.ref("count").keys()).toEqual([]);
        expect(await db.ref("missing").keys()).toEqual([]);
    });

    it("reads in export format", async () => {
        server.seed("count", 7);

        const value = await db.ref("count").exportValue();

        expect(value).toEqual({ ".value": 7, ".priority": null });
        expect(server.requests[0].url).toBe(
            "https://db.example.com/count/.json?format=export",
        );
    });

    it("rejects a value that does not match the schema", async () => {
        await db.ref("users/bob").set({ name: "Bob" });

        const read = db.ref("users/bob").get(testUser);

        await expect(read).rejects.toBeInstanceOf(DecodeError);
        await expect(read).rejects.toThrow(
            "unexpected response shape: score: Required",
        );
    });

    it("rejects values the serializer cannot represent", async () => {
        await expect(db.ref("a").set(undefined)).rejects.toBeInstanceOf(
            EncodeError,
        );
        await expect(db.ref("a").set({ n: 1n })).rejects.toBeInstanceOf(
            EncodeError,
        );
        expect(server.requests).toHaveLength(0);
    });

    it("surfaces a rejected request with the server's body", async () => {
        const secured = new MemoryDatabase({ auth: "test-secret" });
        const client = new Database("db.example.com", {
            transport: secured,
            logger: createConsoleLogger("silent"),
        });

        const error: unknown = await client
            .ref("private")
            .get()
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RemoteRejectedError);
        expect(isDatabaseError(error, "remote-rejected")).toBe(true);
        if (error instanceof RemoteRejectedError) {
            expect(error.status).toBe(401);
            expect(error.body).toBe('{"error":"Permission denied"}');
            expect(error.message).toBe('{"error":"Permission denied"}');
        }

        const authed = new Database("db.example.com", {
            auth: "test-secret",
            transport: secured,
            logger: createConsoleLogger("silent"),
        });
        expect(await authed.ref("private").get()).toBeNull();
    });
});

describe("Reference with a custom transport", () => {
    const respond = (status: number, body: string): Transport => ({
        send: async () => new Response(body, { status }),
    });

    it("passes a 2xx body to the serializer verbatim", async () => {
        const seen: string[] = [];
        const serializer: Serializer = {
            stringify: (value) => JSON.stringify(value),
            parse: (text) => {
                seen.push(text);
                return JSON.parse(text);
            },
        };
        const db = new Database("db.example.com", {
            transport: respond(200, "null"),
            serializer,
            logger: createConsoleLogger("silent"),
        });

        expect(await db.ref().get()).toBeNull();
        expect(seen).toEqual(["null"]);
    });

    it("fails on a body that is not JSON", async () => {
        const db = new Database("db.example.com", {
            transport: respond(200, "<html>"),
            logger: createConsoleLogger("silent"),
        });
        await expect(db.ref().get()).rejects.toBeInstanceOf(DecodeError);
    });

    it("fails a push whose response has no name", async () => {
        const db = new Database("db.example.com", {
            transport: respond(200, '{"id":"x"}'),
            logger: createConsoleLogger("silent"),
        });
        await expect(db.ref("list").push(1)).rejects.toThrow(
            "unexpected response shape: name: Required",
        );
    });

    it("treats a 3xx that reached the executor as a rejection", async () => {
        const db = new Database("db.example.com", {
            transport: respond(300, "multiple choices"),
            logger: createConsoleLogger("silent"),
        });
        await expect(db.ref().get()).rejects.toMatchObject({
            kind: "remote-rejected",
            status: 300,
            body: "multiple choices",
        });
    });
});
