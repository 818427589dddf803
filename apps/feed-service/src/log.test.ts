import { test } from "node:test";
import assert from "node:assert/strict";
import { formatLogLine, redact } from "./log.js";

test("api keys and bearer tokens are redacted", () => {
  assert.deepEqual(
    redact({ "api-key": "test", headers: { authorization: "Bearer abc" }, note: "Bearer xyz" }),
    { "api-key": "[redacted]", headers: { authorization: "[redacted]" }, note: "Bearer [redacted]" }
  );
});

test("errors are reduced to name and message", () => {
  assert.deepEqual(redact({ error: new TypeError("bad input") }), {
    error: { name: "TypeError", message: "bad input" }
  });
});

test("log lines carry level, service and event", () => {
  assert.equal(
    formatLogLine("info", "media.stored", { userId: 3, apiKey: "test" }),
    '{"level":"info","service":"feed-service","event":"media.stored","userId":3,"apiKey":"[redacted]"}'
  );
});
