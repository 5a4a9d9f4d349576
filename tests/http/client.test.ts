// client.test.ts — Node.js native test runner, fetch replaced by an in-memory fake
import test from "node:test";
import assert from "node:assert/strict";
import { getJson, postJson, postNoBack, putJson, resolveApiKey } from "../../cortex/http/client";
import { HttpError } from "../../cortex/http/errors";
import type { ValidationResult } from "../../cortex/http/types";

interface Call { url: string; init?: RequestInit }

function fakeFetch(reply: () => Response) {
    const calls: Call[] = [];
    const impl: typeof fetch = async (input, init) => {
        calls.push({ url: String(input), init });
        return reply();
    };
    return { impl, calls };
}

const jsonReply = (data: unknown, status = 200) => () =>
    new Response(JSON.stringify(data), { status, headers: { "Content-Type": "application/json" } });

const headersOf = (c: Call) => new Headers(c.init?.headers);

test("resolveApiKey: option, then env, then empty", () => {
    assert.equal(resolveApiKey({ apiKey: "test-key", env: { X_API_KEY: "env-key" } }), "test-key");
    assert.equal(resolveApiKey({ env: { X_API_KEY: "env-key" } }), "env-key");
    assert.equal(resolveApiKey({ env: {} }), "");
});

test("getJson: sends accept + api key and decodes the reply", async () => {
    const f = fakeFetch(jsonReply({ id: 5, name: "Some Body" }));
    const user = await getJson("http://upstream.test/users?user_id=5", { fetch: f.impl, apiKey: "test-key" });
    assert.deepEqual(user, { id: 5, name: "Some Body" });
    assert.equal(f.calls.length, 1);
    assert.equal(f.calls[0].url, "http://upstream.test/users?user_id=5");
    assert.equal(f.calls[0].init?.method, "GET");
    assert.equal(headersOf(f.calls[0]).get("accept"), "application/json");
    assert.equal(headersOf(f.calls[0]).get("x-api-key"), "test-key");
    assert.equal(f.calls[0].init?.body, undefined);
});

test("postJson: encodes the payload and validates the reply", async () => {
    const f = fakeFetch(jsonReply({ id: 9 }));
    const validate = (v: unknown): ValidationResult<{ id: number }> =>
        typeof v === "object" && v !== null && "id" in v && typeof v.id === "number"
            ? { ok: true, data: { id: v.id } }
            : { ok: false, errors: ["id missing"] };

    const created = await postJson("http://upstream.test/users", { name: "Some Body" }, { fetch: f.impl, env: {} }, validate);
    assert.equal(created.id, 9);
    assert.equal(f.calls[0].init?.method, "POST");
    assert.equal(f.calls[0].init?.body, '{"name":"Some Body"}');
    assert.equal(headersOf(f.calls[0]).get("content-type"), "application/json; charset=UTF-8");
    assert.equal(headersOf(f.calls[0]).get("x-api-key"), "");

    const bad = fakeFetch(jsonReply({ other: true }));
    await assert.rejects(
        postJson("http://upstream.test/users", {}, { fetch: bad.impl }, validate),
        (e: unknown) => e instanceof HttpError && e.kind === "SerializationFailure",
    );
});

test("postNoBack / putJson use their verbs", async () => {
    const f = fakeFetch(jsonReply({ done: true }));
    await postNoBack("http://upstream.test/events", { kind: "ping" }, { fetch: f.impl });
    assert.deepEqual(await putJson("http://upstream.test/jobs/1", { fetch: f.impl }), { done: true });
    assert.deepEqual(f.calls.map(c => c.init?.method), ["POST", "PUT"]);
});

test("client: upstream failures map to UpstreamIoFailure", async () => {
    const down: typeof fetch = async () => { throw new TypeError("fetch failed"); };
    await assert.rejects(getJson("http://upstream.test/", { fetch: down }), (e: unknown) =>
        e instanceof HttpError && e.kind === "UpstreamIoFailure" && e.status === 502);

    const f = fakeFetch(jsonReply({ error: "nope" }, 503));
    await assert.rejects(getJson("http://upstream.test/", { fetch: f.impl }), (e: unknown) =>
        e instanceof HttpError && e.detail.kind === "UpstreamIoFailure" && e.detail.upstreamStatus === 503);
});

test("client: non-JSON reply is a serialization failure", async () => {
    const f = fakeFetch(() => new Response("<html>oops</html>", { status: 200 }));
    await assert.rejects(getJson("http://upstream.test/", { fetch: f.impl }), (e: unknown) =>
        e instanceof HttpError && e.kind === "SerializationFailure");
});

test("client: unserializable payload never reaches the network", async () => {
    const f = fakeFetch(jsonReply({}));
    await assert.rejects(postJson("http://upstream.test/", { n: NaN }, { fetch: f.impl }), (e: unknown) =>
        e instanceof HttpError && e.kind === "SerializationFailure");
    assert.equal(f.calls.length, 0);
});
