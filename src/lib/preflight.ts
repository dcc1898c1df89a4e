import type {
  CommitDescriptor,
  RemoteGraphNode,
  RevisionContent,
} from "./stackTypes.js";
import type { ReviewerProblem, ReviewServer } from "./conduit.js";
import { parseBugIds } from "./bugs.js";
import { PreflightError } from "./errors.js";

export interface PreflightEntry {
  descriptor: CommitDescriptor;
  content: RevisionContent;
  node: RemoteGraphNode | null; // The open revision being updated, if any
}

export interface PreflightOptions {
  force: boolean;
  wip: boolean | null;
  bug: string | null;
  noBug: boolean;
  requireBugId: boolean;
}

export interface PreflightReport {
  errors: string[]; // Empty under --force: they're warnings then
  warnings: string[];
}

const ARC_SUMMARY_RE = /^Summary:/m;
const ARC_REVIEWERS_RE = /^Reviewers:/m;

function bare(reviewer: string): string {
  return reviewer.replace(/!+$/, "").toLowerCase();
}

/**
 * Reviewers the submission will set on the entry's revision
 */
export function reviewersToSet(entry: PreflightEntry): string[] {
  const { content, node } = entry;
  if (!content.reviewers.length || content.wip || node?.hasReviewers) {
    return [];
  }
  return content.reviewers;
}

function describeProblem(problem: ReviewerProblem): string {
  switch (problem.kind) {
    case "unknown":
      return `${problem.name} isn't a valid reviewer name`;
    case "disabled":
      return `User ${problem.name} is disabled`;
    case "away":
      return problem.until
        ? `${problem.name} isn't available until ${problem.until}`
        : `${problem.name} isn't available`;
  }
}

/**
 * Check the commits that are about to be submitted. `problems` are the
 * reviewer problems the server reported for `reviewersToSet`.
 */
export function checkEntries(
  entries: PreflightEntry[],
  problems: ReviewerProblem[],
  options: PreflightOptions,
): PreflightReport {
  const problemsByName = new Map(problems.map((p) => [bare(p.name), p]));
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const entry of entries) {
    const { descriptor, content, node } = entry;
    const label = `${descriptor.localId.slice(0, 12)}: `;
    const fail = (message: string) =>
      (options.force ? warnings : errors).push(label + message);
    const warn = (message: string) => warnings.push(label + message);

    if (options.requireBugId && !options.noBug && content.bugId === null) {
      fail("Missing bug ID");
    }
    if (
      ARC_SUMMARY_RE.test(descriptor.body) &&
      ARC_REVIEWERS_RE.test(descriptor.body)
    ) {
      fail("Contains arc fields");
    }
    for (const reviewer of reviewersToSet(entry)) {
      const problem = problemsByName.get(bare(reviewer));
      if (problem) fail(describeProblem(problem));
    }

    if (!content.reviewers.length && !node?.hasReviewers) {
      warn("Missing reviewers");
    }
    if (!options.bug && parseBugIds(descriptor.title).length > 1) {
      warn(`Several bug IDs in the title, using ${content.bugId}`);
    }
    if (node) {
      if (node.bugId !== null && content.bugId !== null) {
        if (node.bugId !== content.bugId) {
          warn(`Bug ID will change from ${node.bugId} to ${content.bugId}`);
        }
      }
      const remoteWip = node.reviewStatus === "changes-planned";
      if (remoteWip && !content.wip) {
        warn('"Changes Planned" status will change to "Request Review"');
      } else if (!remoteWip && content.wip) {
        warn('"Request Review" status will change to "Changes Planned"');
      }
    } else if (content.wip && options.wip === null) {
      warn(
        'It will be submitted as "Changes Planned". ' +
          "Run submit again with --no-wip to prevent this.",
      );
    }
  }
  return { errors, warnings };
}

/**
 * Check the commits, asking the server about the reviewers they set.
 * Throws a PreflightError unless `options.force`; returns the warnings.
 */
export async function runPreflight(
  server: ReviewServer,
  entries: PreflightEntry[],
  options: PreflightOptions,
): Promise<string[]> {
  const reviewers = [
    ...new Set(entries.flatMap((entry) => reviewersToSet(entry))),
  ];
  const problems = reviewers.length
    ? await server.checkReviewers(reviewers)
    : [];
  const { errors, warnings } = checkEntries(entries, problems, options);
  if (errors.length) {
    throw new PreflightError(errors);
  }
  return warnings;
}
