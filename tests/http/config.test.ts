// config.test.ts — Node.js native test runner
import test from "node:test";
import assert from "node:assert/strict";
import { boolEnv, intEnv, listEnv, loadConfig, loadCorsPolicy, strEnv } from "../../cortex/http/config";

test("env helpers: defaults and parsing", () => {
    const env = { FLAG: "on", OFF: "0", N: "42", BAD: "x", BLANK: " ", S: "hi" };
    assert.equal(boolEnv(env, "FLAG"), true);
    assert.equal(boolEnv(env, "OFF", true), false);
    assert.equal(boolEnv(env, "MISSING", true), true);
    assert.equal(intEnv(env, "N", 1), 42);
    assert.equal(intEnv(env, "BAD", 1), 1);
    assert.equal(intEnv(env, "BLANK", 7), 7);
    assert.equal(strEnv(env, "S"), "hi");
    assert.equal(strEnv(env, "MISSING", "d"), "d");
});

test("listEnv: splits, trims and drops empty items", () => {
    const env = { CSV: " a, b ,,c ", PIPE: "x|y", BLANK: "  " };
    assert.deepEqual(listEnv(env, "CSV"), ["a", "b", "c"]);
    assert.deepEqual(listEnv(env, "PIPE", "|"), ["x", "y"]);
    assert.deepEqual(listEnv(env, "BLANK", ",", ["d"]), ["d"]);
    assert.deepEqual(listEnv(env, "MISSING"), []);
});

test("loadCorsPolicy: reads env and is frozen", () => {
    const policy = loadCorsPolicy({
        CORS_ORIGIN: "https://a.test",
        CORS_METHODS: "GET,PUT",
        CORS_HEADERS_MODE: "echo-requested",
        CORS_EXPOSED_HEADERS: "X-Request-Id",
        CORS_CREDENTIALS: "yes",
        CORS_MAX_AGE: "60",
        CORS_VARY: "off",
    });
    assert.deepEqual({ ...policy }, {
        origin: "https://a.test",
        methods: ["GET", "PUT"],
        allowedHeaders: ["Content-Type", "Authorization", "X-Api-Key"],
        headersMode: "echo-requested",
        exposedHeaders: ["X-Request-Id"],
        credentials: true,
        maxAge: 60,
        vary: false,
    });
    assert.ok(Object.isFrozen(policy));
    assert.ok(Object.isFrozen(policy.methods));
    assert.equal(loadCorsPolicy({ CORS_MAX_AGE: "soon" }).maxAge, 600);
});

test("loadConfig: defaults", () => {
    const cfg = loadConfig({});
    assert.equal(cfg.appName, "cortex");
    assert.equal(cfg.host, "0.0.0.0");
    assert.equal(cfg.port, 8080);
    assert.deepEqual(cfg.log, { level: "info", json: false });
    assert.equal(cfg.cors.origin, "*");
    assert.deepEqual(cfg.cors.methods, ["GET", "POST", "OPTIONS"]);
    assert.equal(cfg.cors.headersMode, "fixed-list");
    assert.ok(Object.isFrozen(cfg));
    assert.ok(Object.isFrozen(cfg.cors));
});

test("loadConfig: env overrides, APP_* before the short names", () => {
    const cfg = loadConfig({
        APP_NAME: "users-api",
        HOST: "127.0.0.1",
        PORT: "3000",
        APP_PORT: "3006",
        LOG_LEVEL: "WARN",
        LOG_JSON: "true",
        LOG_FILE_PATH: "logs/app.log",
        CORS_HEADERS_MODE: "echo-requested",
    });
    assert.equal(cfg.appName, "users-api");
    assert.equal(cfg.host, "127.0.0.1");
    assert.equal(cfg.port, 3006);
    assert.deepEqual(cfg.log, { level: "warn", json: true, file: "logs/app.log" });
    assert.equal(cfg.cors.headersMode, "echo-requested");
    assert.equal(loadConfig({ APP_DEBUG: "true" }).log.level, "debug");
});
