import { test } from "node:test";
import assert from "node:assert/strict";
import { buildRelevantUserSet, rankFeed } from "./ranking.js";

type Tweet = { id: number; likes: Array<{ userId: number }> };

const tweet = (id: number, likerIds: number[]): Tweet => ({
  id,
  likes: likerIds.map((userId) => ({ userId }))
});

const ids = (tweets: Tweet[]) => tweets.map((entry) => entry.id);

test("relevant set always includes the viewer", () => {
  assert.deepEqual([...buildRelevantUserSet(1, [])], [1]);
  assert.deepEqual([...buildRelevantUserSet(1, [3, 2])].sort(), [1, 2, 3]);
  assert.equal(buildRelevantUserSet(1, [1, 2]).size, 2);
});

test("a relevant like outranks any raw like count", () => {
  const relevant = buildRelevantUserSet(1, [2]);
  const ranked = rankFeed([tweet(10, [5, 6, 7, 8]), tweet(11, [2])], relevant);
  assert.deepEqual(ids(ranked), [11, 10]);
});

test("own likes boost rank even without follows", () => {
  const relevant = buildRelevantUserSet(1, []);
  const ranked = rankFeed([tweet(10, [5, 6]), tweet(11, [1])], relevant);
  assert.deepEqual(ids(ranked), [11, 10]);
});

test("within the same boost group more likes rank first", () => {
  const relevant = buildRelevantUserSet(1, [2]);
  const ranked = rankFeed(
    [tweet(1, [5]), tweet(2, [1]), tweet(3, [5, 6, 7]), tweet(4, [2, 5, 6]), tweet(5, [])],
    relevant
  );
  assert.deepEqual(ids(ranked), [4, 2, 3, 1, 5]);
});

test("equal keys keep retrieval order", () => {
  const relevant = buildRelevantUserSet(9, []);
  const ranked = rankFeed(
    [tweet(7, [1]), tweet(3, []), tweet(5, [2]), tweet(1, []), tweet(2, [4])],
    relevant
  );
  assert.deepEqual(ids(ranked), [7, 5, 2, 3, 1]);
});

test("input array is not reordered", () => {
  const input = [tweet(1, []), tweet(2, [1])];
  const ranked = rankFeed(input, buildRelevantUserSet(1, []));
  assert.deepEqual(ids(ranked), [2, 1]);
  assert.deepEqual(ids(input), [1, 2]);
});

test("empty input yields an empty feed", () => {
  assert.deepEqual(rankFeed([], buildRelevantUserSet(1, [])), []);
});
