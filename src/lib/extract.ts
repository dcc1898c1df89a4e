import type { CommitDescriptor, RawCommit } from "./stackTypes.js";
import type { RangeRequest, ReadOptions, VcsFunctions } from "./vcs.js";
import { StackError } from "./errors.js";
import { splitMessage } from "./marker.js";
import { logger } from "./logger.js";

export const MAX_STACK_SIZE = 100;

export interface ExtractOptions extends RangeRequest, ReadOptions {}

/**
 * Check that every commit's only parent is the commit before it. The stack
 * root may be a merge; it is diffed against its first parent.
 */
export function validateLinearStack(commits: RawCommit[]): void {
  for (let i = 1; i < commits.length; i++) {
    const commit = commits[i];
    if (commit.parents.length > 1) {
      throw new StackError(
        `Multiple parents found for commit ${commit.id}, unable to continue`,
      );
    }
    if (commit.parents[0] !== commits[i - 1].id) {
      throw new StackError(
        `Commit ${commit.id} is not a child of ${commits[i - 1].id}, unable to continue`,
      );
    }
  }
}

/**
 * Build descriptors for raw commits that already form a linear stack
 */
export function toDescriptors(
  commits: RawCommit[],
  changes: CommitDescriptor["changes"][],
): CommitDescriptor[] {
  return commits.map((commit, ordinal) => {
    const { title, body } = splitMessage(commit.message);
    return {
      localId: commit.id,
      commitHash: commit.commitHash,
      baseCommitHash: commit.parentHashes[0] ?? null,
      ordinal,
      title,
      body,
      message: commit.message,
      author: commit.author,
      changes: changes[ordinal] ?? [],
      parent: ordinal === 0 ? null : commits[ordinal - 1].id,
      identity: null,
    };
  });
}

/**
 * List the commits of the requested range and read their changes
 */
export async function extractStack(
  vcs: VcsFunctions,
  options: ExtractOptions,
): Promise<CommitDescriptor[]> {
  const range = await vcs.resolveRange(options);
  logger.debug(`Stack range: ${range.base ?? "(root)"}..${range.head}`);

  const commits = await vcs.listCommits(range);
  if (commits.length === 0) {
    throw new StackError("Failed to find any commits to submit");
  }
  if (commits.length > MAX_STACK_SIZE) {
    throw new StackError(
      `Unable to create a stack with ${commits.length} unpublished commits.\n\n` +
        "This is usually the result of a failure to detect the correct remote repository.\n" +
        "Try again with `--upstream <remote>`, or set `git.remote` in the config file.",
    );
  }
  validateLinearStack(commits);

  const changes: CommitDescriptor["changes"][] = [];
  for (const commit of commits) {
    changes.push(await vcs.readChanges(commit, options));
  }
  return toDescriptors(commits, changes);
}
