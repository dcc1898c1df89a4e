import assert from "assert/strict";
import {
  hasReviewers,
  makeBlocking,
  morphBlockingReviewers,
  parseReviewers,
  removeDuplicates,
  replaceReviewers,
  resolveReviewers,
} from "./reviewers.js";

suite("reviewers", () => {
  test("parses requested and granted reviewers from a title", () => {
    assert.deepEqual(parseReviewers("Fix bug r?alice,bob r=carol"), {
      request: ["alice", "bob"],
      granted: ["carol"],
    });
    assert.deepEqual(parseReviewers("Fix bug"), { request: [], granted: [] });
  });

  test("morphs the r! typo into blocking reviewers", () => {
    assert.equal(
      morphBlockingReviewers("Fix r!alice,bob"),
      "Fix r=alice!,bob!",
    );
  });

  test("makes reviewers blocking once", () => {
    assert.deepEqual(makeBlocking(["alice", "bob!"]), ["alice!", "bob!"]);
  });

  test("prefers the blocking form of a repeated reviewer", () => {
    assert.deepEqual(removeDuplicates(["alice", "bob", "alice!"]), [
      "bob",
      "alice!",
    ]);
  });

  test("keeps title reviewers without flags", () => {
    const fromTitle = { request: ["alice"], granted: [] };
    const noFlags = { reviewers: [], blockers: [] };
    assert.deepEqual(resolveReviewers(fromTitle, noFlags, false), {
      request: ["alice"],
      granted: [],
    });
    assert.deepEqual(resolveReviewers(fromTitle, noFlags, true), {
      request: ["alice!"],
      granted: [],
    });
  });

  test("flags replace the title's reviewers", () => {
    const fromTitle = { request: ["bob", "dave"], granted: [] };
    assert.deepEqual(
      resolveReviewers(
        fromTitle,
        { reviewers: ["bob"], blockers: ["carol"] },
        false,
      ),
      { request: ["bob"], granted: ["carol!"] },
    );
  });

  test("rewrites the first specifier and drops the rest", () => {
    assert.equal(
      replaceReviewers("Fix bug r?alice", { request: ["bob"], granted: [] }),
      "Fix bug r?bob",
    );
    assert.equal(
      replaceReviewers("Fix r?alice r=bob", {
        request: ["carol"],
        granted: [],
      }),
      "Fix r?carol",
    );
  });

  test("appends a specifier to titles without one", () => {
    assert.equal(
      replaceReviewers("Fix bug", { request: [], granted: ["bob"] }),
      "Fix bug r=bob",
    );
  });

  test("reports whether anyone reviews", () => {
    assert.ok(hasReviewers({ request: [], granted: ["bob"] }));
    assert.ok(!hasReviewers({ request: [], granted: [] }));
  });
});
