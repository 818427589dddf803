import { test } from "node:test";
import assert from "node:assert/strict";
import { createTestApp } from "../testUtils/testApp.js";

test("healthz reports the store as reachable", async () => {
  const { app, close } = await createTestApp();
  try {
    const response = await app.inject({ method: "GET", url: "/healthz" });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { ok: true, db: { ok: true } });
  } finally {
    await close();
  }
});

test("metrics are rendered as prometheus text", async () => {
  const { app, close } = await createTestApp();
  try {
    const response = await app.inject({ method: "GET", url: "/metrics" });
    assert.equal(response.statusCode, 200);
    assert.equal(response.headers["content-type"], "text/plain; version=0.0.4");
    const lines = response.body.split("\n");
    assert.ok(lines.includes('db_up{service="feed-service"} 1'));
    assert.ok(lines.includes("# TYPE feed_action_total counter"));
  } finally {
    await close();
  }
});

test("request id is echoed back", async () => {
  const { app, close } = await createTestApp();
  try {
    const response = await app.inject({
      method: "GET",
      url: "/healthz",
      headers: { "x-request-id": "req-123" }
    });
    assert.equal(response.headers["x-request-id"], "req-123");
  } finally {
    await close();
  }
});

test("unknown routes answer with the error body", async () => {
  const { app, close } = await createTestApp();
  try {
    const response = await app.inject({ method: "GET", url: "/api/nope" });
    assert.equal(response.statusCode, 404);
    assert.deepEqual(response.json(), {
      result: false,
      error_type: "NotFound",
      error_message: "Route not found"
    });
  } finally {
    await close();
  }
});

test("requests over the rate limit are reported as rate limited", async () => {
  const { app, close } = await createTestApp({ rateLimitMax: 2 });
  try {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const allowed = await app.inject({ method: "GET", url: "/healthz" });
      assert.equal(allowed.statusCode, 200);
    }
    const limited = await app.inject({ method: "GET", url: "/healthz" });
    assert.equal(limited.statusCode, 429);
    assert.deepEqual(limited.json(), {
      result: false,
      error_type: "RateLimited",
      error_message: "Too many requests"
    });
  } finally {
    await close();
  }
});
