// respond.test.ts — Node.js native test runner
import test from "node:test";
import assert from "node:assert/strict";
import { encodeJson, json, jsonCors, jsonOrNotFound, notFound, badRequest, text } from "../../cortex/http/respond";
import { normCors } from "../../cortex/http/cors";
import { HttpError } from "../../cortex/http/errors";
import { bodyJson, bodyText, makeRequest } from "./request.harness";

test("json: serializes the user with status 200 and JSON content type", () => {
    const res = json({ id: 17, name: "Some Body" });
    assert.equal(res.status, 200);
    assert.deepEqual(res.headers, { "Content-Type": "application/json" });
    assert.equal(bodyText(res), '{"id":17,"name":"Some Body"}');
});

test("json: body decodes back to the value", () => {
    const values: unknown[] = [
        { nested: { list: [1, "two", null, true] }, empty: {} },
        [1.25, -3, 0],
        "plain string",
        42,
        null,
    ];
    for (const v of values) assert.deepEqual(bodyJson(json(v)), v);
});

test("json: status is mutable for other success codes", () => {
    const res = json({ id: 1 });
    res.status = 201;
    assert.equal(res.status, 201);
});

const serializationFailed = (e: unknown) => e instanceof HttpError && e.kind === "SerializationFailure";

test("json: refuses values JSON cannot carry", () => {
    const cyclic: Record<string, unknown> = { a: 1 };
    cyclic.self = cyclic;

    assert.throws(() => json({ ratio: NaN }), serializationFailed);
    assert.throws(() => json([Infinity]), serializationFailed);
    assert.throws(() => json({ big: 10n }), serializationFailed);
    assert.throws(() => json(cyclic), serializationFailed);
    assert.throws(() => json(undefined), serializationFailed);
    assert.throws(() => json({ toJSON() { throw new Error("nope"); } }), serializationFailed);
});

test("encodeJson: drops undefined members the way JSON does", () => {
    assert.equal(encodeJson({ a: undefined, b: 1 }), '{"b":1}');
});

test("text / notFound / badRequest keep body and content type consistent", () => {
    const t = text("success");
    assert.equal(t.status, 200);
    assert.equal(t.headers["Content-Type"], "text/plain; charset=utf-8");
    assert.equal(bodyText(t), "success");

    const nf = notFound();
    assert.equal(nf.status, 404);
    assert.equal(nf.headers["Content-Type"], "application/json");
    assert.deepEqual(bodyJson(nf), { ok: false, error: "NOT_FOUND", message: "Item not found" });

    assert.deepEqual(bodyJson(badRequest("nope")), { ok: false, error: "BAD_REQUEST", message: "nope" });
    assert.equal(badRequest().status, 400);
});

test("jsonOrNotFound: 404 only for a missing value", () => {
    assert.equal(jsonOrNotFound(null).status, 404);
    assert.equal(jsonOrNotFound(undefined).status, 404);
    const found = jsonOrNotFound({ id: 3 });
    assert.equal(found.status, 200);
    assert.deepEqual(bodyJson(found), { id: 3 });
    assert.equal(bodyText(jsonOrNotFound(0)), "0");
});

test("jsonCors: JSON plus allow-origin", () => {
    const res = jsonCors({ id: 1 }, makeRequest("/"), normCors());
    assert.equal(res.headers["Access-Control-Allow-Origin"], "*");
    assert.equal(res.headers["Content-Type"], "application/json");
    assert.equal(res.headers["Vary"], undefined);
});
