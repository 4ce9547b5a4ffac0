import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Readable } from "node:stream";
import { handler } from "../src/entrypoints/lambda/handler";
import { route } from "../src/entrypoints/server/index";
import { errorResult, headerValue, jsonResult, parseJsonBody } from "../src/entrypoints/respond";
import { ConfigurationError, KeyExtractionError } from "../src/domain/errors";

function parse(body: string): Record<string, unknown> {
  const value: unknown = JSON.parse(body);
  assert.ok(value !== null && typeof value === "object" && !Array.isArray(value));
  return Object.fromEntries(Object.entries(value));
}

describe("lambda handler", () => {
  it("returns the unique items", async () => {
    const res = await handler({
      headers: {},
      body: JSON.stringify({ items: [{ mod: 0 }, { mod: 1 }, { mod: 0 }], conf: { uniq_key: "mod" } }),
    });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(parse(res.body), {
      ok: true,
      result: { received: 3, emitted: 2, items: [{ mod: 0 }, { mod: 1 }] },
    });
  });

  it("rejects invalid JSON with 400", async () => {
    const res = await handler({ headers: {}, body: "{not json" });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(parse(res.body), { ok: false, error: "Invalid JSON body" });
  });

  it("maps configuration errors to 400", async () => {
    const res = await handler({ headers: {}, body: JSON.stringify({ items: [], conf: { uniq_key: "" } }) });
    assert.equal(res.statusCode, 400);
    assert.equal(parse(res.body).code, "CONFIGURATION_ERROR");
  });

  it("accepts an event whose headers are null", async () => {
    const res = await handler({ headers: null, body: JSON.stringify({ items: [{ title: "a" }, { title: "a" }] }) });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(parse(res.body), {
      ok: true,
      result: { received: 2, emitted: 1, items: [{ title: "a" }] },
    });
  });

  it("maps a missing body to 400", async () => {
    const res = await handler({ headers: {}, body: null });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(parse(res.body), {
      ok: false,
      error: "feed body must be an object, got undefined",
      code: "INPUT_TYPE_ERROR",
    });
  });
});

describe("headerValue", () => {
  it("looks headers up regardless of case", () => {
    assert.equal(headerValue({ "X-Pipe-Verbose": "1" }, "x-pipe-verbose"), "1");
    assert.equal(headerValue({ "x-pipe-verbose": "0" }, "X-Pipe-Verbose"), "0");
    assert.equal(headerValue({ other: "1" }, "x-pipe-verbose"), undefined);
  });

  it("returns undefined for absent header maps", () => {
    assert.equal(headerValue(null, "x-pipe-verbose"), undefined);
    assert.equal(headerValue(undefined, "x-pipe-verbose"), undefined);
  });
});

describe("respond", () => {
  it("maps key extraction errors to 422", () => {
    const res = errorResult(new KeyExtractionError(4, "title", "is a function"));
    assert.equal(res.statusCode, 422);
    assert.deepEqual(parse(res.body), {
      ok: false,
      error: 'key extraction must yield a hashable/comparable value: item 4 field "title" is a function',
      code: "KEY_EXTRACTION_ERROR",
      details: { index: 4, field: "title", reason: "is a function" },
    });
  });

  it("maps unknown failures to 500", () => {
    assert.equal(errorResult(new Error("boom")).statusCode, 500);
    assert.deepEqual(parse(errorResult("boom").body), { ok: false, error: "boom" });
  });

  it("serializes bigint values as strings", () => {
    const res = errorResult(new ConfigurationError("bad", { details: { uniq_key: 5n } }));
    assert.deepEqual(parse(res.body).details, { uniq_key: "5" });
    assert.equal(jsonResult(200, { n: 1n }).body, '{"n":"1"}');
  });

  it("parses bodies", () => {
    assert.deepEqual(parseJsonBody(""), { ok: true, value: undefined });
    assert.deepEqual(parseJsonBody('{"a":1}'), { ok: true, value: { a: 1 } });
    assert.deepEqual(parseJsonBody("{"), { ok: false });
  });
});

describe("dev server route", () => {
  function request(method: string, url: string, body = "") {
    return Object.assign(Readable.from(body ? [Buffer.from(body)] : []), { method, url, headers: {} });
  }

  it("answers health checks", async () => {
    const res = await route(request("GET", "/health"));
    assert.equal(res.statusCode, 200);
    assert.equal(res.body, '{"ok":true}');
  });

  it("runs the uniq pipe on POST /pipes/uniq", async () => {
    const body = JSON.stringify({ items: [{ title: "a" }, { title: "a" }, { title: "b" }], conf: { uniq_key: "title" } });
    const res = await route(request("POST", "/pipes/uniq", body));
    assert.equal(res.statusCode, 200);
    assert.deepEqual(parse(res.body), {
      ok: true,
      result: { received: 3, emitted: 2, items: [{ title: "a" }, { title: "b" }] },
    });
  });

  it("returns 404 for other paths", async () => {
    assert.equal((await route(request("POST", "/pipes/other", "{}"))).statusCode, 404);
    assert.equal((await route(request("GET", "/pipes/uniq"))).statusCode, 404);
  });

  it("rejects invalid JSON with 400", async () => {
    const res = await route(request("POST", "/pipes/uniq", "[oops"));
    assert.equal(res.statusCode, 400);
  });
});
