import type {
  CommitDescriptor,
  RemoteGraphNode,
  RemoteIdentity,
} from "./stackTypes.js";
import type { IdentityCache } from "./identityCache.js";
import {
  DuplicateIdentityError,
  MarkerError,
  ReorderedStackError,
  StaleIdentityError,
} from "./errors.js";
import { findMarkers } from "./marker.js";
import { logger } from "./logger.js";

/**
 * Bind each descriptor to the revision its marker names. Commits without a
 * marker fall back to the identity cache, which remembers revisions created
 * by a run that failed before amending the commit. The cache is keyed by
 * commit hash, so any later edit of the commit drops the fallback.
 */
export function resolveIdentities(
  descriptors: CommitDescriptor[],
  cache: IdentityCache,
): CommitDescriptor[] {
  const owners = new Map<RemoteIdentity, string>();

  return descriptors.map((descriptor) => {
    const markers = findMarkers(descriptor.message);
    if (markers.length > 1) {
      throw new MarkerError(descriptor.localId);
    }

    let identity: RemoteIdentity | null = markers[0] ?? null;
    if (identity === null) {
      identity = cache.commits.get(descriptor.commitHash) ?? null;
      if (identity !== null) {
        logger.debug(
          `Recovered D${identity} for ${descriptor.localId} from the identity cache`,
        );
      }
    }

    if (identity !== null) {
      const owner = owners.get(identity);
      if (owner !== undefined) {
        throw new DuplicateIdentityError(identity, [owner, descriptor.localId]);
      }
      owners.set(identity, descriptor.localId);
    }
    return { ...descriptor, identity };
  });
}

/**
 * Every bound identity must be among the nodes the server returned
 */
export function checkStaleIdentities(
  descriptors: CommitDescriptor[],
  nodes: Map<RemoteIdentity, RemoteGraphNode>,
): void {
  for (const descriptor of descriptors) {
    if (descriptor.identity !== null && !nodes.has(descriptor.identity)) {
      throw new StaleIdentityError(descriptor.identity, descriptor.localId);
    }
  }
}

/**
 * Compare the order of bound identities with the order of the last
 * submission. Identities new to either side are ignored.
 */
export function detectReorder(
  descriptors: CommitDescriptor[],
  cache: IdentityCache,
): void {
  const previousIndex = new Map(
    cache.stack.map((identity, index) => [identity, index]),
  );
  let highest: { identity: RemoteIdentity; index: number } | null = null;

  for (const descriptor of descriptors) {
    if (descriptor.identity === null) continue;
    const index = previousIndex.get(descriptor.identity);
    if (index === undefined) continue;

    if (highest && index < highest.index) {
      throw new ReorderedStackError(highest.identity, descriptor.identity);
    }
    if (!highest || index > highest.index) {
      highest = { identity: descriptor.identity, index };
    }
  }
}
