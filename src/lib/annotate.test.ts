import assert from "assert/strict";
import { applyAmendments, planAmendments } from "./annotate.js";
import { extractStack } from "./extract.js";
import { AmendmentError } from "./errors.js";
import {
  SERVER_URL,
  createFakeVcs,
  makeContent,
  makeDescriptor,
} from "./testUtils.js";

const request = {
  start: null,
  end: null,
  single: false,
  upstreams: [],
  lessContext: false,
};

suite("annotate", () => {
  test("plans markers for commits that lack them", () => {
    const descriptors = [
      makeDescriptor(0),
      makeDescriptor(1, {
        message: `Commit 2\n\nDifferential Revision: ${SERVER_URL}/D101`,
      }),
    ];
    const contents = new Map(
      descriptors.map((d) => [d.ordinal, makeContent(d)]),
    );
    const amendments = planAmendments(
      descriptors,
      contents,
      new Map([
        [0, 100],
        [1, 101],
      ]),
      SERVER_URL,
    );
    assert.deepEqual(amendments, [
      {
        ordinal: 0,
        localId: "c1",
        identity: 100,
        message: `Commit 1\n\nDifferential Revision: ${SERVER_URL}/D100`,
      },
    ]);
  });

  test("replaces a marker for a recreated revision and keeps the body", () => {
    const descriptor = makeDescriptor(0, {
      message: `Commit 1\n\nDetails\n\nDifferential Revision: ${SERVER_URL}/D7`,
    });
    const [amendment] = planAmendments(
      [descriptor],
      new Map([[0, makeContent(descriptor, { title: "Commit 1 r?alice" })]]),
      new Map([[0, 8]]),
      SERVER_URL,
    );
    assert.equal(
      amendment.message,
      `Commit 1 r?alice\n\nDetails\n\nDifferential Revision: ${SERVER_URL}/D8`,
    );
  });

  test("amends content-addressed commits tail first and relists the stack", async () => {
    const vcs = createFakeVcs(["Commit 1", "Commit 2", "Commit 3"]);
    const descriptors = await extractStack(vcs, request);
    const amendments = planAmendments(
      descriptors,
      new Map(),
      new Map([
        [0, 100],
        [2, 102],
      ]),
      SERVER_URL,
    );

    const localIds = await applyAmendments(vcs, descriptors, amendments);
    assert.deepEqual(vcs.amended, ["c3", "c1"]);
    assert.deepEqual(localIds, ["c1'", "c2'", "c3''"]);
    assert.deepEqual(
      vcs.commits().map((c) => c.message),
      [
        `Commit 1\n\nDifferential Revision: ${SERVER_URL}/D100`,
        "Commit 2",
        `Commit 3\n\nDifferential Revision: ${SERVER_URL}/D102`,
      ],
    );
  });

  test("amends stable ids in stack order", async () => {
    const vcs = createFakeVcs(["Commit 1", "Commit 2"], "stable");
    const descriptors = await extractStack(vcs, request);
    const amendments = planAmendments(
      descriptors,
      new Map(),
      new Map([
        [0, 100],
        [1, 101],
      ]),
      SERVER_URL,
    );

    const localIds = await applyAmendments(vcs, descriptors, amendments);
    assert.deepEqual(vcs.amended, ["change1", "change2"]);
    assert.deepEqual(localIds, ["change1", "change2"]);
  });

  test("refuses to amend over uncommitted changes", async () => {
    const vcs = createFakeVcs(["Commit 1"]);
    vcs.clean = false;
    const descriptors = await extractStack(vcs, request);
    const amendments = planAmendments(
      descriptors,
      new Map(),
      new Map([[0, 100]]),
      SERVER_URL,
    );

    await assert.rejects(
      applyAmendments(vcs, descriptors, amendments),
      AmendmentError,
    );
    assert.deepEqual(vcs.amended, []);
  });

  test("wraps amend failures", async () => {
    const vcs = createFakeVcs(["Commit 1"]);
    const descriptors = [makeDescriptor(0, { localId: "gone" })];
    const amendments = planAmendments(
      descriptors,
      new Map(),
      new Map([[0, 100]]),
      SERVER_URL,
    );

    await assert.rejects(
      applyAmendments(vcs, descriptors, amendments),
      (error: unknown) =>
        error instanceof AmendmentError &&
        error.localId === "gone" &&
        error.message === "Failed to amend gone for D100: unknown commit gone",
    );
  });
});
