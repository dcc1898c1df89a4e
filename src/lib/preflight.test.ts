import assert from "assert/strict";
import type { RemoteGraphNode, RevisionContent } from "./stackTypes.js";
import {
  checkEntries,
  runPreflight,
  type PreflightEntry,
  type PreflightOptions,
} from "./preflight.js";
import { PreflightError } from "./errors.js";
import {
  FakeReviewServer,
  makeContent,
  makeDescriptor,
  makeNode,
} from "./testUtils.js";

const options: PreflightOptions = {
  force: false,
  wip: null,
  bug: null,
  noBug: false,
  requireBugId: false,
};

function entry(
  message: string,
  content: Partial<RevisionContent> = {},
  node: RemoteGraphNode | null = null,
): PreflightEntry {
  const descriptor = makeDescriptor(0, { message });
  return { descriptor, content: makeContent(descriptor, content), node };
}

const reviewed = { reviewers: ["alice"], wip: false };

suite("preflight", () => {
  test("rejects commits carrying arc fields", () => {
    const report = checkEntries(
      [entry("Commit 1\n\nSummary: Fix\nReviewers: alice", reviewed)],
      [],
      options,
    );
    assert.deepEqual(report, {
      errors: ["c1: Contains arc fields"],
      warnings: [],
    });
  });

  test("rejects reviewers that can't review", () => {
    const report = checkEntries(
      [
        entry("Commit 1", {
          reviewers: ["alice", "bob!", "carol"],
          wip: false,
        }),
      ],
      [
        { name: "bob", kind: "disabled" },
        { name: "carol", kind: "away", until: "2026-01-01" },
        { name: "alice", kind: "unknown" },
      ],
      options,
    );
    assert.deepEqual(report.errors, [
      "c1: alice isn't a valid reviewer name",
      "c1: User bob is disabled",
      "c1: carol isn't available until 2026-01-01",
    ]);
  });

  test("force turns errors into warnings", () => {
    const report = checkEntries(
      [entry("Commit 1", { reviewers: ["bob"], wip: false })],
      [{ name: "bob", kind: "away", until: null }],
      { ...options, force: true },
    );
    assert.deepEqual(report, {
      errors: [],
      warnings: ["c1: bob isn't available"],
    });
  });

  test("ignores reviewers of a revision that already has some", () => {
    const checked = entry("Commit 1", reviewed);
    checked.node = makeNode(10, checked.content);
    assert.deepEqual(
      checkEntries([checked], [{ name: "alice", kind: "disabled" }], options),
      { errors: [], warnings: [] },
    );
  });

  test("requires a bug ID unless told not to", () => {
    const required = { ...options, requireBugId: true };
    const report = checkEntries([entry("Commit 1")], [], required);
    assert.deepEqual(report.errors, ["c1: Missing bug ID"]);
    assert.deepEqual(report.warnings, [
      "c1: Missing reviewers",
      'c1: It will be submitted as "Changes Planned". ' +
        "Run submit again with --no-wip to prevent this.",
    ]);

    const skipped = { ...required, noBug: true };
    assert.deepEqual(checkEntries([entry("Commit 1")], [], skipped).errors, []);
  });

  test("warns about status and bug ID changes", () => {
    const node = makeNode(
      10,
      makeContent(makeDescriptor(0), { ...reviewed, bugId: "42" }),
    );
    const toDraft = entry(
      "Commit 1",
      { ...reviewed, wip: true, bugId: "43" },
      node,
    );
    assert.deepEqual(checkEntries([toDraft], [], options).warnings, [
      "c1: Bug ID will change from 42 to 43",
      'c1: "Request Review" status will change to "Changes Planned"',
    ]);

    const draft = { ...node, reviewStatus: "changes-planned" };
    const toReview = entry("Commit 1", reviewed, draft);
    assert.deepEqual(checkEntries([toReview], [], options).warnings, [
      'c1: "Changes Planned" status will change to "Request Review"',
    ]);
  });

  test("warns when a title names several bugs", () => {
    const report = checkEntries(
      [entry("Bug 1 - fix b=2", { ...reviewed, bugId: "1" })],
      [],
      options,
    );
    assert.deepEqual(report.warnings, [
      "c1: Several bug IDs in the title, using 1",
    ]);
  });

  test("asks the server only about reviewers being set", async () => {
    const server = new FakeReviewServer();
    server.reviewerProblems.set("bob", { name: "bob", kind: "disabled" });

    await assert.rejects(
      runPreflight(
        server,
        [entry("Commit 1", { reviewers: ["alice", "bob!"], wip: false })],
        options,
      ),
      (error: unknown) =>
        error instanceof PreflightError &&
        error.problems.length === 1 &&
        error.problems[0] === "c1: User bob is disabled",
    );
    assert.deepEqual(server.calls, ["check alice,bob!"]);

    server.calls.length = 0;
    const warnings = await runPreflight(server, [entry("Commit 1")], options);
    assert.deepEqual(server.calls, []);
    assert.equal(warnings.length, 2);
  });
});
