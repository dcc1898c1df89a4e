import type {
  ParentRef,
  PlanOperation,
  ReconciliationPlan,
  RemoteIdentity,
} from "./stackTypes.js";
import type { ReviewServer } from "./conduit.js";
import { StackError, toError } from "./errors.js";
import { logger } from "./logger.js";

export interface ExecuteOptions {
  comment: string | null; // Added to updated revisions
}

export interface ExecutionCallbacks {
  onOperationStarted?: (operation: PlanOperation, index: number) => void;
  onOperationCompleted?: (
    operation: PlanOperation,
    index: number,
    identity: RemoteIdentity,
  ) => void;
}

export interface ExecutionFailure {
  operationIndex: number;
  operation: PlanOperation;
  error: Error;
}

export interface ExecutionResult {
  identities: Map<number, RemoteIdentity>; // ordinal -> identity, for every ordinal known after the run
  created: Set<number>; // ordinals that got a new revision
  completedOperations: number;
  lastSucceededOrdinal: number | null;
  failure: ExecutionFailure | null;
}

function resolveParent(
  parent: ParentRef,
  outputs: Map<number, RemoteIdentity>,
): RemoteIdentity | null {
  switch (parent.type) {
    case "root":
      return null;
    case "identity":
      return parent.identity;
    case "output": {
      const identity = outputs.get(parent.operationIndex);
      if (identity === undefined) {
        throw new StackError(
          `Operation ${parent.operationIndex} has no result to use as a parent`,
        );
      }
      return identity;
    }
  }
}

async function applyOperation(
  operation: PlanOperation,
  parent: RemoteIdentity | null,
  server: ReviewServer,
  options: ExecuteOptions,
): Promise<RemoteIdentity> {
  switch (operation.type) {
    case "create":
      return server.create(operation.content, parent);
    case "update":
      await server.update(operation.identity, operation.content, parent, {
        comment: options.comment,
        includeDiff: operation.reason !== "metadata",
      });
      return operation.identity;
    case "reparent":
      await server.setParent(operation.identity, parent);
      return operation.identity;
  }
}

/**
 * Apply the plan's operations one at a time. Execution stops at the first
 * failing operation; everything applied before it stays applied.
 */
export async function executePlan(
  plan: ReconciliationPlan,
  server: ReviewServer,
  options: ExecuteOptions,
  callbacks?: ExecutionCallbacks,
): Promise<ExecutionResult> {
  const identities = new Map<number, RemoteIdentity>();
  for (const [ordinal, identity] of plan.bindings) {
    if (identity !== null) identities.set(ordinal, identity);
  }

  const result: ExecutionResult = {
    identities,
    created: new Set(),
    completedOperations: 0,
    lastSucceededOrdinal: null,
    failure: null,
  };
  const outputs = new Map<number, RemoteIdentity>();

  for (const [index, operation] of plan.operations.entries()) {
    try {
      callbacks?.onOperationStarted?.(operation, index);
      const parent = resolveParent(operation.parent, outputs);
      const identity = await applyOperation(operation, parent, server, options);

      outputs.set(index, identity);
      identities.set(operation.ordinal, identity);
      if (operation.type === "create") result.created.add(operation.ordinal);
      result.completedOperations = index + 1;
      result.lastSucceededOrdinal = operation.ordinal;
      callbacks?.onOperationCompleted?.(operation, index, identity);
    } catch (error) {
      const err = toError(error);
      logger.error(
        `Operation ${index} (${operation.type}) failed: ${err.message}`,
      );
      result.failure = { operationIndex: index, operation, error: err };
      break;
    }
  }
  return result;
}
