import assert from "assert/strict";
import { applyBugId, parseBugIds } from "./bugs.js";

suite("bug IDs", () => {
  test("finds bug references in titles", () => {
    assert.deepEqual(parseBugIds("Bug 123 - Fix crash"), ["123"]);
    assert.deepEqual(parseBugIds("b=45 fix and bug67"), ["45", "67"]);
    assert.deepEqual(parseBugIds("Fix debug 12 output"), []);
    assert.deepEqual(parseBugIds("bugfix for the parser"), []);
  });

  test("rewrites the first reference", () => {
    assert.equal(applyBugId("bug 123 fix crash", "123"), "Bug 123 fix crash");
    assert.equal(applyBugId("b=45 fix", "45"), "Bug 45 fix");
    assert.equal(applyBugId("Bug 1 - Fix", "2"), "Bug 2 - Fix");
  });

  test("prefixes titles without a reference", () => {
    assert.equal(applyBugId("Fix crash", "123"), "Bug 123 - Fix crash");
  });

  test("leaves the title alone without a bug ID", () => {
    assert.equal(applyBugId("Fix crash", null), "Fix crash");
  });
});
