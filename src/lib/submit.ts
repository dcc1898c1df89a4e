import type {
  CommitDescriptor,
  ReconciliationPlan,
  RemoteGraphNode,
  RemoteIdentity,
  RevisionContent,
} from "./stackTypes.js";
import type { ReviewServer } from "./conduit.js";
import type { IdentityCache, IdentityStore } from "./identityCache.js";
import type { SubmitConfig } from "./config.js";
import type { VcsFunctions } from "./vcs.js";
import type { ExecutionCallbacks } from "./execute.js";
import type { Amendment, AnnotationCallbacks } from "./annotate.js";
import type { ExtractOptions } from "./extract.js";
import type { ReviewerArgs } from "./reviewers.js";
import { extractStack } from "./extract.js";
import {
  checkStaleIdentities,
  detectReorder,
  resolveIdentities,
} from "./identity.js";
import { recordIdentities } from "./identityCache.js";
import { transformDiff } from "./diffTransform.js";
import { reconcile } from "./reconcile.js";
import { executePlan } from "./execute.js";
import { applyAmendments, planAmendments } from "./annotate.js";
import { revisionUrl, stripMarker } from "./marker.js";
import { applyBugId, parseBugIds } from "./bugs.js";
import { runPreflight, type PreflightEntry } from "./preflight.js";
import {
  hasReviewers,
  morphBlockingReviewers,
  parseReviewers,
  removeDuplicates,
  replaceReviewers,
  resolveReviewers,
} from "./reviewers.js";
import { SubmissionError, toError } from "./errors.js";
import { logger } from "./logger.js";

export interface SubmitOptions extends ExtractOptions {
  force: boolean;
  wip: boolean | null; // null: WIP exactly when there are no reviewers
  reviewers: ReviewerArgs;
  comment: string | null;
  allowReorder: boolean;
  bug: string | null; // Overrides the bug ID in every title
  noBug: boolean; // Submit without a bug ID even when one is required
}

// Collaborators of a submission, threaded explicitly into every step
export interface SubmitContext {
  vcs: VcsFunctions;
  server: ReviewServer;
  store: IdentityStore;
  config: SubmitConfig;
}

export interface SubmissionPlan {
  descriptors: CommitDescriptor[];
  contents: Map<number, RevisionContent>;
  reconciliation: ReconciliationPlan;
  amendments: Amendment[]; // Needed already, before any revision is created
  cache: IdentityCache;
}

export interface SubmissionCallbacks
  extends ExecutionCallbacks,
    AnnotationCallbacks {
  onAnalyzingStack?: () => void;
  onStackFound?: (descriptors: CommitDescriptor[]) => void;
  onFetchingRevisions?: (identities: RemoteIdentity[]) => void;
  onWarning?: (message: string) => void;
  onPlanReady?: (plan: SubmissionPlan) => void;
  onError?: (error: Error, context: string) => void;
}

export interface SubmittedRevision {
  ordinal: number;
  localId: string; // After annotation, when the commit was amended
  identity: RemoteIdentity;
  url: string;
  created: boolean;
}

export interface SubmissionResult {
  success: boolean;
  revisions: SubmittedRevision[];
  amended: Amendment[];
  errors: Array<{ error: Error; context: string }>;
}

/**
 * Title, summary, reviewers and WIP state a commit is submitted with
 */
export function buildRevisionContent(
  descriptor: CommitDescriptor,
  options: Pick<SubmitOptions, "reviewers" | "wip" | "bug">,
  config: SubmitConfig,
): RevisionContent {
  const title = morphBlockingReviewers(descriptor.title);
  const bugId = options.bug ?? parseBugIds(title)[0] ?? null;
  const reviewers = resolveReviewers(
    parseReviewers(title),
    options.reviewers,
    config.submit.alwaysBlocking,
  );
  const withReviewers = hasReviewers(reviewers);

  return {
    title: applyBugId(
      withReviewers ? replaceReviewers(title, reviewers) : title,
      bugId,
    ),
    summary: stripMarker(descriptor.body),
    diff: transformDiff(descriptor),
    reviewers: removeDuplicates([...reviewers.request, ...reviewers.granted]),
    wip: options.wip ?? !withReviewers,
    bugId,
  };
}

/**
 * A plan that neither touches the server nor rewrites a commit
 */
export function isPlanEmpty(plan: SubmissionPlan): boolean {
  return (
    plan.reconciliation.operations.length === 0 &&
    plan.amendments.length === 0
  );
}

/**
 * Read the local stack and the server's view of it, and plan the operations
 * that bring the server in line. Nothing is written.
 */
export async function analyzeSubmission(
  context: SubmitContext,
  options: SubmitOptions,
  callbacks?: SubmissionCallbacks,
): Promise<SubmissionPlan> {
  try {
    callbacks?.onAnalyzingStack?.();
    const extracted = await extractStack(context.vcs, options);
    const cache = await context.store.load();
    const descriptors = resolveIdentities(extracted, cache);
    callbacks?.onStackFound?.(descriptors);

    if (!options.allowReorder) {
      detectReorder(descriptors, cache);
    }

    const bound = descriptors.flatMap((d) =>
      d.identity === null ? [] : [d.identity],
    );
    let remote = new Map<RemoteIdentity, RemoteGraphNode>();
    if (bound.length) {
      callbacks?.onFetchingRevisions?.(bound);
      remote = await context.server.get(bound);
    }
    checkStaleIdentities(descriptors, remote);

    const entries = descriptors.map((descriptor) => ({
      descriptor,
      content: buildRevisionContent(descriptor, options, context.config),
    }));
    const contents = new Map(
      entries.map(({ descriptor, content }) => [descriptor.ordinal, content]),
    );
    const reconciliation = reconcile(entries, remote, {
      force: options.force,
    });

    // Only commits that send a title, summary or diff are checked
    const submitted = new Set(
      reconciliation.operations.flatMap((op) =>
        op.type === "reparent" ? [] : [op.ordinal],
      ),
    );
    const checked = entries
      .filter(({ descriptor }) => submitted.has(descriptor.ordinal))
      .map(({ descriptor, content }): PreflightEntry => {
        const node =
          descriptor.identity === null
            ? undefined
            : remote.get(descriptor.identity);
        return {
          descriptor,
          content,
          node: node?.status === "open" ? node : null,
        };
      });
    const preflightWarnings = await runPreflight(context.server, checked, {
      force: options.force,
      wip: options.wip,
      bug: options.bug,
      noBug: options.noBug,
      requireBugId: context.config.submit.requireBugId,
    });
    for (const warning of [...reconciliation.warnings, ...preflightWarnings]) {
      callbacks?.onWarning?.(warning);
    }

    const boundIdentities = new Map<number, RemoteIdentity>();
    for (const [ordinal, identity] of reconciliation.bindings) {
      if (identity !== null) boundIdentities.set(ordinal, identity);
    }

    const plan: SubmissionPlan = {
      descriptors,
      contents,
      reconciliation,
      amendments: planAmendments(
        descriptors,
        contents,
        boundIdentities,
        context.server.url,
      ),
      cache,
    };
    callbacks?.onPlanReady?.(plan);
    return plan;
  } catch (error) {
    const err = toError(error);
    callbacks?.onError?.(err, "planning");
    throw err;
  }
}

/**
 * Apply a plan: run the operations, remember the identities, then write the
 * markers into the commit messages. A halted execution still records and
 * annotates what it managed to submit, so a rerun picks up from there.
 */
export async function executeSubmissionPlan(
  context: SubmitContext,
  plan: SubmissionPlan,
  options: Pick<SubmitOptions, "comment">,
  callbacks?: SubmissionCallbacks,
): Promise<SubmissionResult> {
  const result: SubmissionResult = {
    success: true,
    revisions: [],
    amended: [],
    errors: [],
  };
  const fail = (error: Error, where: string) => {
    result.errors.push({ error, context: where });
    callbacks?.onError?.(error, where);
    result.success = false;
  };

  const execution = await executePlan(
    plan.reconciliation,
    context.server,
    { comment: options.comment },
    callbacks,
  );
  if (execution.failure) {
    const { operationIndex, operation, error } = execution.failure;
    fail(
      new SubmissionError(
        `Failed to ${operation.type} revision for commit ` +
          `#${operation.ordinal + 1}: ${error.message}`,
        operationIndex,
        execution.lastSucceededOrdinal,
        error,
      ),
      "execution",
    );
  }

  for (const descriptor of plan.descriptors) {
    const identity = execution.identities.get(descriptor.ordinal);
    if (identity === undefined) continue;
    result.revisions.push({
      ordinal: descriptor.ordinal,
      localId: descriptor.localId,
      identity,
      url: revisionUrl(context.server.url, identity),
      created: execution.created.has(descriptor.ordinal),
    });
  }

  try {
    await context.store.save(
      recordIdentities(
        plan.cache,
        result.revisions.map((revision) => ({
          commitHash: plan.descriptors[revision.ordinal].commitHash,
          identity: revision.identity,
        })),
        result.revisions.map((revision) => revision.identity),
      ),
    );
  } catch (error) {
    fail(toError(error), "saving identity cache");
  }

  const amendments = planAmendments(
    plan.descriptors,
    plan.contents,
    execution.identities,
    context.server.url,
  );
  try {
    const localIds = await applyAmendments(
      context.vcs,
      plan.descriptors,
      amendments,
      callbacks,
    );
    // AIDEV-NOTE: Amending rewrites content-addressed ids, including those
    // of descendants that weren't amended themselves
    for (const revision of result.revisions) {
      revision.localId = localIds[revision.ordinal] ?? revision.localId;
    }
    result.amended = amendments.map((amendment) => ({
      ...amendment,
      localId: localIds[amendment.ordinal] ?? amendment.localId,
    }));
  } catch (error) {
    fail(toError(error), "annotation");
  }

  logger.debug(
    `Submission finished: ${execution.completedOperations}/` +
      `${plan.reconciliation.operations.length} operations, ` +
      `${result.amended.length} commits amended`,
  );
  return result;
}
