import type {
  CommitDescriptor,
  ParentRef,
  PlanOperation,
  ReconciliationPlan,
  RemoteGraphNode,
  RemoteIdentity,
  RevisionContent,
} from "./stackTypes.js";
import { StaleIdentityError } from "./errors.js";
import { stripMarker } from "./marker.js";

export interface ReconcileEntry {
  descriptor: CommitDescriptor;
  content: RevisionContent;
}

export interface ReconcileOptions {
  force?: boolean; // Update bound revisions even when nothing changed
}

function parentMatches(
  remoteParents: RemoteIdentity[],
  expected: ParentRef,
): boolean {
  switch (expected.type) {
    case "root":
      return remoteParents.length === 0;
    case "identity":
      return (
        remoteParents.length === 1 && remoteParents[0] === expected.identity
      );
    case "output":
      // A revision created in this run can't be anyone's parent yet
      return false;
  }
}

function metadataDiffers(
  node: RemoteGraphNode,
  content: RevisionContent,
): boolean {
  const remoteWip = node.reviewStatus === "changes-planned";
  // Reviewers are only sent to a revision that has none
  const reviewersAdded =
    content.reviewers.length > 0 && !content.wip && !node.hasReviewers;
  const bugChanged = content.bugId !== null && content.bugId !== node.bugId;
  return (
    node.title !== content.title ||
    stripMarker(node.summary).trim() !== stripMarker(content.summary).trim() ||
    remoteWip !== content.wip ||
    reviewersAdded ||
    bugChanged
  );
}

/**
 * Compute the operations that bring the remote revisions in line with the
 * local stack. Entries must be in ordinal order and `nodes` must hold every
 * bound identity.
 */
export function reconcile(
  entries: ReconcileEntry[],
  nodes: Map<RemoteIdentity, RemoteGraphNode>,
  options: ReconcileOptions = {},
): ReconciliationPlan {
  const operations: PlanOperation[] = [];
  const warnings: string[] = [];
  const inSync: number[] = [];
  const bindings = new Map<number, RemoteIdentity | null>();
  let previous: ParentRef = { type: "root" };

  for (const { descriptor, content } of entries) {
    const { ordinal, identity } = descriptor;
    const node = identity === null ? undefined : nodes.get(identity);
    if (identity !== null && !node) {
      throw new StaleIdentityError(identity, descriptor.localId);
    }

    if (identity === null || !node || node.status !== "open") {
      if (identity !== null && node) {
        warnings.push(
          `D${identity} is ${node.status}; ${descriptor.localId} will be ` +
            "submitted as a new revision.",
        );
      }
      operations.push({
        type: "create",
        ordinal,
        content,
        parent: previous,
        replaces: identity,
      });
      bindings.set(ordinal, null);
      previous = { type: "output", operationIndex: operations.length - 1 };
      continue;
    }

    bindings.set(ordinal, identity);
    const update = { type: "update", ordinal, identity, content } as const;
    if (node.diffHash !== content.diff.contentHash) {
      operations.push({ ...update, parent: previous, reason: "content" });
    } else if (options.force) {
      operations.push({ ...update, parent: previous, reason: "forced" });
    } else if (metadataDiffers(node, content)) {
      operations.push({ ...update, parent: previous, reason: "metadata" });
    } else if (!parentMatches(node.parents, previous)) {
      operations.push({
        type: "reparent",
        ordinal,
        identity,
        parent: previous,
      });
    } else {
      inSync.push(ordinal);
    }
    previous = { type: "identity", identity };
  }

  return { operations, warnings, inSync, bindings };
}

/**
 * Check that no operation refers to the output of itself or a later one
 */
export function isTopologicallyOrdered(plan: ReconciliationPlan): boolean {
  return plan.operations.every(
    (operation, index) =>
      operation.parent.type !== "output" ||
      operation.parent.operationIndex < index,
  );
}
