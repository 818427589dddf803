import { test } from "node:test";
import assert from "node:assert/strict";
import { createTestApp } from "../testUtils/testApp.js";

const ALICE = { "api-key": "key-alice" };
const CAROL = { "api-key": "key-carol" };

test("follow, repeat, unfollow, repeat", async () => {
  const { app, close } = await createTestApp();
  try {
    const followed = await app.inject({ method: "POST", url: "/api/users/2/follow", headers: ALICE });
    assert.equal(followed.statusCode, 201);
    assert.deepEqual(followed.json(), { result: true });

    const again = await app.inject({ method: "POST", url: "/api/users/2/follow", headers: ALICE });
    assert.equal(again.statusCode, 409);
    assert.deepEqual(again.json(), {
      result: false,
      error_type: "Conflict",
      error_message: "Already following this user"
    });

    const unfollowed = await app.inject({ method: "DELETE", url: "/api/users/2/follow", headers: ALICE });
    assert.equal(unfollowed.statusCode, 200);
    assert.deepEqual(unfollowed.json(), { result: true });

    const unfollowedAgain = await app.inject({
      method: "DELETE",
      url: "/api/users/2/follow",
      headers: ALICE
    });
    assert.equal(unfollowedAgain.statusCode, 404);
    assert.deepEqual(unfollowedAgain.json(), {
      result: false,
      error_type: "NotFound",
      error_message: "Follow not found"
    });
  } finally {
    await close();
  }
});

test("self follow and self unfollow are validation errors", async () => {
  const { app, close } = await createTestApp();
  try {
    const follow = await app.inject({ method: "POST", url: "/api/users/1/follow", headers: ALICE });
    assert.equal(follow.statusCode, 400);
    assert.deepEqual(follow.json(), {
      result: false,
      error_type: "Validation",
      error_message: "You cannot follow yourself"
    });

    const unfollow = await app.inject({ method: "DELETE", url: "/api/users/1/follow", headers: ALICE });
    assert.equal(unfollow.statusCode, 400);
    assert.equal(unfollow.json().error_message, "You cannot unfollow yourself");
  } finally {
    await close();
  }
});

test("following an unknown user is not found", async () => {
  const { app, close } = await createTestApp();
  try {
    const response = await app.inject({ method: "POST", url: "/api/users/99/follow", headers: ALICE });
    assert.equal(response.statusCode, 404);
    assert.equal(response.json().error_message, "User not found");
  } finally {
    await close();
  }
});

test("own profile lists followers and following", async () => {
  const { app, close } = await createTestApp();
  try {
    await app.inject({ method: "POST", url: "/api/users/2/follow", headers: ALICE });
    await app.inject({ method: "POST", url: "/api/users/1/follow", headers: CAROL });

    const me = await app.inject({ method: "GET", url: "/api/users/me", headers: ALICE });
    assert.equal(me.statusCode, 200);
    assert.deepEqual(me.json(), {
      result: true,
      user: {
        id: 1,
        name: "alice",
        followers: [{ id: 3, name: "carol" }],
        following: [{ id: 2, name: "bob" }]
      }
    });

    const anonymous = await app.inject({ method: "GET", url: "/api/users/me" });
    assert.equal(anonymous.statusCode, 401);
  } finally {
    await close();
  }
});

test("profile by id needs no api key", async () => {
  const { app, close } = await createTestApp();
  try {
    await app.inject({ method: "POST", url: "/api/users/2/follow", headers: ALICE });
    const bob = await app.inject({ method: "GET", url: "/api/users/2" });
    assert.equal(bob.statusCode, 200);
    assert.deepEqual(bob.json(), {
      result: true,
      user: { id: 2, name: "bob", followers: [{ id: 1, name: "alice" }], following: [] }
    });

    const missing = await app.inject({ method: "GET", url: "/api/users/99" });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), {
      result: false,
      error_type: "NotFound",
      error_message: "User not found"
    });

    const invalid = await app.inject({ method: "GET", url: "/api/users/abc" });
    assert.equal(invalid.statusCode, 400);
    assert.deepEqual(invalid.json(), {
      result: false,
      error_type: "Validation",
      error_message: "Invalid request"
    });
  } finally {
    await close();
  }
});

test("user ids beyond the integer column range are rejected as invalid", async () => {
  const { app, close } = await createTestApp();
  try {
    const profile = await app.inject({ method: "GET", url: "/api/users/2147483648" });
    assert.equal(profile.statusCode, 400);

    const follow = await app.inject({ method: "POST", url: "/api/users/2147483648/follow", headers: ALICE });
    assert.equal(follow.statusCode, 400);
    assert.equal(follow.json().error_type, "Validation");
  } finally {
    await close();
  }
});
