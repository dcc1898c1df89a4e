import assert from "assert/strict";
import {
  checkStaleIdentities,
  detectReorder,
  resolveIdentities,
} from "./identity.js";
import { emptyIdentityCache } from "./identityCache.js";
import {
  DuplicateIdentityError,
  MarkerError,
  ReorderedStackError,
  StaleIdentityError,
} from "./errors.js";
import { makeContent, makeDescriptor, makeNode } from "./testUtils.js";

const marker = (id: number) =>
  `\n\nDifferential Revision: https://phabricator.test/D${id}`;

suite("identity resolution", () => {
  test("binds commits through their markers", () => {
    const descriptors = resolveIdentities(
      [makeDescriptor(0, { message: `First${marker(10)}` }), makeDescriptor(1)],
      emptyIdentityCache(),
    );
    assert.deepEqual(
      descriptors.map((d) => d.identity),
      [10, null],
    );
  });

  test("falls back to the cache by commit hash", () => {
    const cache = { commits: new Map([["hash2", 11]]), stack: [] };
    const descriptors = resolveIdentities(
      [makeDescriptor(0), makeDescriptor(1)],
      cache,
    );
    assert.deepEqual(
      descriptors.map((d) => d.identity),
      [null, 11],
    );
  });

  test("markers win over the cache", () => {
    const cache = { commits: new Map([["hash1", 99]]), stack: [] };
    const [descriptor] = resolveIdentities(
      [makeDescriptor(0, { message: `First${marker(10)}` })],
      cache,
    );
    assert.equal(descriptor.identity, 10);
  });

  test("rejects two commits bound to one revision", () => {
    assert.throws(
      () =>
        resolveIdentities(
          [
            makeDescriptor(0, { message: `A${marker(10)}` }),
            makeDescriptor(1, { message: `B${marker(10)}` }),
          ],
          emptyIdentityCache(),
        ),
      (error: unknown) =>
        error instanceof DuplicateIdentityError &&
        error.identity === 10 &&
        error.localIds[0] === "c1" &&
        error.localIds[1] === "c2",
    );
  });

  test("rejects a commit with two markers", () => {
    assert.throws(
      () =>
        resolveIdentities(
          [makeDescriptor(0, { message: `A${marker(10)}${marker(11)}` })],
          emptyIdentityCache(),
        ),
      MarkerError,
    );
  });

  test("reports identities the server didn't return", () => {
    const descriptor = { ...makeDescriptor(0), identity: 10 };
    assert.throws(
      () => checkStaleIdentities([descriptor], new Map()),
      (error: unknown) =>
        error instanceof StaleIdentityError &&
        error.identity === 10 &&
        error.localId === "c1",
    );
    const nodes = new Map([[10, makeNode(10, makeContent(descriptor))]]);
    assert.doesNotThrow(() => checkStaleIdentities([descriptor], nodes));
  });

  test("detects revisions moved below an earlier one", () => {
    const cache = { commits: new Map<string, number>(), stack: [1, 2] };
    const descriptors = [
      { ...makeDescriptor(0), identity: 2 },
      { ...makeDescriptor(1), identity: 1 },
    ];
    assert.throws(
      () => detectReorder(descriptors, cache),
      (error: unknown) =>
        error instanceof ReorderedStackError &&
        error.message.startsWith(
          "D1 was submitted below D2, but now sits above it",
        ),
    );
  });

  test("ignores new and dropped revisions when checking order", () => {
    const cache = { commits: new Map<string, number>(), stack: [1, 2, 3] };
    const descriptors = [
      { ...makeDescriptor(0), identity: 1 },
      makeDescriptor(1),
      { ...makeDescriptor(2), identity: 3 },
    ];
    assert.doesNotThrow(() => detectReorder(descriptors, cache));
  });
});
