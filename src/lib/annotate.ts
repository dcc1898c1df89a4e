import type {
  CommitDescriptor,
  RemoteIdentity,
  RevisionContent,
} from "./stackTypes.js";
import type { VcsFunctions } from "./vcs.js";
import { AmendmentError, toError } from "./errors.js";
import { buildMessage, revisionUrl, sameMessage } from "./marker.js";
import { logger } from "./logger.js";

export interface Amendment {
  ordinal: number;
  localId: string;
  identity: RemoteIdentity;
  message: string;
}

export interface AnnotationCallbacks {
  onAmendStarted?: (amendment: Amendment) => void;
  onAmendCompleted?: (amendment: Amendment) => void;
}

/**
 * Commits whose message must change to carry the marker of their revision
 */
export function planAmendments(
  descriptors: CommitDescriptor[],
  contents: Map<number, RevisionContent>,
  identities: Map<number, RemoteIdentity>,
  serverUrl: string,
): Amendment[] {
  const amendments: Amendment[] = [];
  for (const descriptor of descriptors) {
    const identity = identities.get(descriptor.ordinal);
    if (identity === undefined) continue;

    const title = contents.get(descriptor.ordinal)?.title ?? descriptor.title;
    const message = buildMessage(
      title,
      descriptor.body,
      revisionUrl(serverUrl, identity),
    );
    if (!sameMessage(message, descriptor.message)) {
      amendments.push({
        ordinal: descriptor.ordinal,
        localId: descriptor.localId,
        identity,
        message,
      });
    }
  }
  return amendments;
}

/**
 * Rewrite commit messages. Content-addressed ids are amended from the
 * stack's tail toward its root, so every id still to be amended stays valid;
 * the stack is re-listed from its base afterwards to learn the new ids.
 * Returns the local id of every descriptor after amending.
 */
export async function applyAmendments(
  vcs: VcsFunctions,
  descriptors: CommitDescriptor[],
  amendments: Amendment[],
  callbacks?: AnnotationCallbacks,
): Promise<string[]> {
  const localIds = descriptors.map((d) => d.localId);
  if (!amendments.length) return localIds;

  const contentAddressed = vcs.identifiers === "content-addressed";
  if (contentAddressed && !(await vcs.isWorkingCopyClean())) {
    throw new AmendmentError(
      "Uncommitted changes present. Commit or stash them, then rerun to add the revision URLs to the commit messages.",
      null,
    );
  }

  const ordered = contentAddressed
    ? [...amendments].sort((a, b) => b.ordinal - a.ordinal)
    : amendments;
  for (const amendment of ordered) {
    callbacks?.onAmendStarted?.(amendment);
    try {
      await vcs.amendCommit(amendment.localId, amendment.message);
    } catch (error) {
      const err = toError(error);
      throw new AmendmentError(
        `Failed to amend ${amendment.localId} for D${amendment.identity}: ${err.message}`,
        amendment.localId,
        err,
      );
    }
    callbacks?.onAmendCompleted?.(amendment);
  }

  if (!contentAddressed) return localIds;

  try {
    const base = descriptors[0]?.baseCommitHash ?? null;
    const head = await vcs.currentHead();
    const commits = await vcs.listCommits({ base, head });
    const relisted = commits
      .slice(0, descriptors.length)
      .map((commit) => commit.id);
    logger.debug(`Stack after amending: ${relisted.join(" ")}`);
    return relisted;
  } catch (error) {
    throw new AmendmentError(
      `Failed to list the stack after amending: ${toError(error).message}`,
      null,
      toError(error),
    );
  }
}
