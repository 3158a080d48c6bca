import test from "node:test";
import assert from "node:assert/strict";
import { isUserAuthorized, toAllowSet } from "../src/channels/allowlist.js";

test("isUserAuthorized matches configured user ids", () => {
  const allowed = toAllowSet([12345, 67890]);
  assert.equal(isUserAuthorized(allowed, 12345), true);
  assert.equal(isUserAuthorized(allowed, 67890), true);
});

test("isUserAuthorized denies unlisted users and everyone when the list is empty", () => {
  assert.equal(isUserAuthorized(toAllowSet([12345]), 1), false);
  assert.equal(isUserAuthorized(toAllowSet([]), 12345), false);
});
