// cortex/http/parse.ts
import type { HttpRequest, Validator } from "./types";
import {
    type HttpError,
    type ScalarKind,
    invalidParameterFormat,
    invalidPayload,
    isHttpError,
    missingParameter,
} from "./errors";

export type { ScalarKind } from "./errors";

export type ScalarOf<K extends ScalarKind> =
    K extends "bool" ? boolean :
    K extends "string" ? string :
    number;

export type Result<T> =
    | { ok: true; data: T }
    | { ok: false; error: HttpError };

const INT_RE = /^[+-]?\d+$/;
const UINT_RE = /^\+?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

function toInt(raw: string, min: number, max: number, re = INT_RE): number | undefined {
    if (!re.test(raw)) return undefined;
    const n = Number(raw);
    if (!Number.isSafeInteger(n) || n < min || n > max) return undefined;
    // "-0" is an integer zero, not IEEE negative zero
    return n === 0 ? 0 : n;
}

function toFloat(raw: string): number | undefined {
    if (FLOAT_RE.test(raw)) return Number(raw);
    const m = FLOAT_SPECIAL_RE.exec(raw);
    if (!m) return undefined;
    if (m[2].toLowerCase() === "nan") return NaN;
    return m[1] === "-" ? -Infinity : Infinity;
}

function toBool(raw: string): boolean | undefined {
    if (raw === "true") return true;
    if (raw === "false") return false;
    return undefined;
}

/** Canonical textual parse per kind; undefined means "not this kind". */
const CONVERTERS: { [K in ScalarKind]: (raw: string) => ScalarOf<K> | undefined } = {
    int: (raw) => toInt(raw, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER),
    i32: (raw) => toInt(raw, -2147483648, 2147483647),
    u32: (raw) => toInt(raw, 0, 4294967295, UINT_RE),
    float: toFloat,
    bool: toBool,
    string: (raw) => raw,
};

/**
 * Decode a form-urlencoded query string into a map.
 * When a key repeats, the first occurrence (left to right) wins.
 */
export function parseQuery(raw: string): Readonly<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const [k, v] of new URLSearchParams(raw)) {
        if (Object.prototype.hasOwnProperty.call(out, k)) continue;
        // defineProperty, so a key such as "__proto__" is stored as data instead of hitting the setter
        Object.defineProperty(out, k, { value: v, enumerable: true, writable: true, configurable: true });
    }
    return Object.freeze(out);
}

export const getQuery = (req: Readonly<HttpRequest>) => parseQuery(req.query);

/**
 * Optional query parameter, converted to `kind`.
 *
 * @example
 *   const page = getQueryOptParam(req, "page_no", "int"); // number | undefined
 * @throws HttpError InvalidParameterFormat when present but unparsable
 */
export function getQueryOptParam<K extends ScalarKind>(
    req: Readonly<HttpRequest>,
    name: string,
    kind: K,
): ScalarOf<K> | undefined {
    const query = getQuery(req);
    if (!Object.prototype.hasOwnProperty.call(query, name)) return undefined;
    const raw = query[name];
    const converted = CONVERTERS[kind](raw);
    if (converted === undefined) throw invalidParameterFormat(name, raw, kind);
    return converted;
}

/**
 * Required query parameter, converted to `kind`.
 *
 * @example
 *   const userId = getQueryParam(req, "user_id", "i32"); // number
 * @throws HttpError MissingParameter or InvalidParameterFormat
 */
export function getQueryParam<K extends ScalarKind>(
    req: Readonly<HttpRequest>,
    name: string,
    kind: K,
): ScalarOf<K> {
    const v = getQueryOptParam(req, name, kind);
    if (v === undefined) throw missingParameter(name);
    return v;
}

/** Same as getQueryParam, with the failure returned instead of thrown. */
export function tryQueryParam<K extends ScalarKind>(
    req: Readonly<HttpRequest>,
    name: string,
    kind: K,
): Result<ScalarOf<K>> {
    try {
        return { ok: true, data: getQueryParam(req, name, kind) };
    } catch (e) {
        if (isHttpError(e)) return { ok: false, error: e };
        throw e;
    }
}

/** Decode the JSON request body, optionally validating its shape. */
export function getPayload(req: Readonly<HttpRequest>): unknown;
export function getPayload<T>(req: Readonly<HttpRequest>, validate: Validator<T>): T;
export function getPayload<T>(req: Readonly<HttpRequest>, validate?: Validator<T>): unknown {
    const raw = req.body ? req.body.toString("utf8").trim() : "";
    if (!raw) throw invalidPayload("empty body");

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e) {
        throw invalidPayload(e instanceof Error ? e.message : String(e));
    }

    if (!validate) return parsed;
    const v = validate(parsed);
    if (!v.ok) throw invalidPayload(v.errors.join("; "));
    return v.data;
}
