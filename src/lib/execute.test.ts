import assert from "assert/strict";
import type { ReconciliationPlan } from "./stackTypes.js";
import { executePlan } from "./execute.js";
import { reconcile } from "./reconcile.js";
import {
  FakeReviewServer,
  makeContent,
  makeDescriptor,
  makeNode,
} from "./testUtils.js";

function newStackPlan(size: number): ReconciliationPlan {
  const descriptors = Array.from({ length: size }, (_, i) =>
    makeDescriptor(i),
  );
  return reconcile(
    descriptors.map((descriptor) => ({
      descriptor,
      content: makeContent(descriptor),
    })),
    new Map(),
  );
}

suite("execute", () => {
  test("creates revisions and chains them to earlier results", async () => {
    const server = new FakeReviewServer();
    const result = await executePlan(newStackPlan(3), server, {
      comment: null,
    });

    assert.equal(result.failure, null);
    assert.deepEqual(server.calls, [
      'create "Commit 1" parent=none',
      'create "Commit 2" parent=D100',
      'create "Commit 3" parent=D101',
    ]);
    assert.deepEqual([...result.identities], [
      [0, 100],
      [1, 101],
      [2, 102],
    ]);
    assert.deepEqual([...result.created], [0, 1, 2]);
    assert.equal(result.completedOperations, 3);
    assert.equal(result.lastSucceededOrdinal, 2);
  });

  test("halts at the first failing operation", async () => {
    const server = new FakeReviewServer();
    server.failOnMutation = 2;
    const started: number[] = [];
    const result = await executePlan(
      newStackPlan(4),
      server,
      { comment: null },
      { onOperationStarted: (_operation, index) => started.push(index) },
    );

    assert.deepEqual(started, [0, 1, 2]);
    assert.equal(result.completedOperations, 2);
    assert.equal(result.lastSucceededOrdinal, 1);
    assert.equal(result.failure?.operationIndex, 2);
    assert.equal(result.failure?.error.message, "server unavailable");
    assert.deepEqual([...result.identities], [
      [0, 100],
      [1, 101],
    ]);
    assert.equal(server.revisions.size, 2);
  });

  test("metadata updates keep the current diff", async () => {
    const descriptor = { ...makeDescriptor(0), identity: 10 };
    const content = makeContent(descriptor);
    const server = new FakeReviewServer();
    const node = makeNode(10, content, { title: "Old title" });
    server.revisions.set(10, node);

    const plan = reconcile([{ descriptor, content }], new Map([[10, node]]));
    const result = await executePlan(plan, server, { comment: "Retitled" });

    assert.deepEqual(server.calls, ["update D10 (metadata)"]);
    assert.deepEqual([...result.identities], [[0, 10]]);
    assert.deepEqual([...result.created], []);
    assert.equal(server.revisions.get(10)?.title, "Commit 1");
  });

  test("reparents bound revisions", async () => {
    const descriptors = [0, 1].map((i) => ({
      ...makeDescriptor(i),
      identity: 10 + i,
    }));
    const contents = descriptors.map((d) => makeContent(d));
    const nodes = new Map([
      [10, makeNode(10, contents[0])],
      [11, makeNode(11, contents[1], { parents: [] })],
    ]);
    const server = new FakeReviewServer();
    for (const [identity, node] of nodes) server.revisions.set(identity, node);

    const plan = reconcile(
      descriptors.map((descriptor, i) => ({
        descriptor,
        content: contents[i],
      })),
      nodes,
    );
    await executePlan(plan, server, { comment: null });

    assert.deepEqual(server.calls, ["reparent D11 parent=D10"]);
    assert.deepEqual(server.revisions.get(11)?.parents, [10]);
  });
});
