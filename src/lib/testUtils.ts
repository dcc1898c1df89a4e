// In-process stand-ins for the VCS and the review server, shared by tests

import type {
  ChangedFileEntry,
  CommitDescriptor,
  RawCommit,
  RemoteGraphNode,
  RemoteIdentity,
  RevisionContent,
} from "./stackTypes.js";
import type {
  ConduitUser,
  ReviewerProblem,
  ReviewServer,
  UpdateOptions,
} from "./conduit.js";
import type { IdentityCache, IdentityStore } from "./identityCache.js";
import type { VcsFunctions } from "./vcs.js";
import { emptyIdentityCache } from "./identityCache.js";
import { transformDiff } from "./diffTransform.js";
import { splitMessage } from "./marker.js";

export const SERVER_URL = "https://phabricator.test";

const TEST_AUTHOR = {
  name: "Test",
  email: "test@example.com",
  date: "1700000000 +0000",
};

export function addedFile(path: string, text: string): ChangedFileEntry {
  return {
    path,
    oldPath: null,
    kind: "add",
    oldMode: null,
    newMode: "100644",
    content: { type: "text", oldText: "", newText: text, diff: null },
  };
}

export function makeDescriptor(
  ordinal: number,
  overrides: Partial<CommitDescriptor> = {},
): CommitDescriptor {
  const message = overrides.message ?? `Commit ${ordinal + 1}`;
  const { title, body } = splitMessage(message);
  return {
    localId: `c${ordinal + 1}`,
    commitHash: `hash${ordinal + 1}`,
    baseCommitHash: ordinal === 0 ? "base" : `hash${ordinal}`,
    ordinal,
    title,
    body,
    message,
    author: TEST_AUTHOR,
    changes: [addedFile(`file${ordinal + 1}.txt`, `line ${ordinal + 1}\n`)],
    parent: ordinal === 0 ? null : `c${ordinal}`,
    identity: null,
    ...overrides,
  };
}

export function makeContent(
  descriptor: CommitDescriptor,
  overrides: Partial<RevisionContent> = {},
): RevisionContent {
  return {
    title: descriptor.title,
    summary: descriptor.body,
    diff: transformDiff(descriptor),
    reviewers: [],
    wip: true,
    bugId: null,
    ...overrides,
  };
}

/**
 * A node that is in sync with `content`
 */
export function makeNode(
  identity: RemoteIdentity,
  content: RevisionContent,
  overrides: Partial<RemoteGraphNode> = {},
): RemoteGraphNode {
  return {
    identity,
    phid: `PHID-DREV-${identity}`,
    parents: [],
    diffHash: content.diff.contentHash,
    status: "open",
    reviewStatus: content.wip ? "changes-planned" : "needs-review",
    hasReviewers: content.reviewers.length > 0,
    bugId: content.bugId,
    title: content.title,
    summary: content.summary,
    ...overrides,
  };
}

function describeParent(parent: RemoteIdentity | null): string {
  return parent === null ? "none" : `D${parent}`;
}

function parentList(parent: RemoteIdentity | null): RemoteIdentity[] {
  return parent === null ? [] : [parent];
}

/**
 * Review server keeping revisions in memory. `failOnMutation` makes the
 * n-th (0-based) create/update/setParent call throw.
 */
export class FakeReviewServer implements ReviewServer {
  readonly url = SERVER_URL;
  readonly revisions = new Map<RemoteIdentity, RemoteGraphNode>();
  readonly calls: string[] = [];
  // Keyed by reviewer name without "!", e.g. "bob" or "#group"
  readonly reviewerProblems = new Map<string, ReviewerProblem>();
  failOnMutation: number | null = null;
  private nextIdentity = 100;
  private mutations = 0;

  private mutate(call: string): void {
    const index = this.mutations++;
    if (this.failOnMutation === index) {
      throw new Error("server unavailable");
    }
    this.calls.push(call);
  }

  async get(
    identities: RemoteIdentity[],
  ): Promise<Map<RemoteIdentity, RemoteGraphNode>> {
    this.calls.push(`get ${identities.map((id) => `D${id}`).join(",")}`);
    const nodes = new Map<RemoteIdentity, RemoteGraphNode>();
    for (const identity of identities) {
      const node = this.revisions.get(identity);
      if (node) nodes.set(identity, { ...node });
    }
    return nodes;
  }

  async create(
    content: RevisionContent,
    parent: RemoteIdentity | null,
  ): Promise<RemoteIdentity> {
    this.mutate(`create "${content.title}" parent=${describeParent(parent)}`);
    const identity = this.nextIdentity++;
    this.revisions.set(
      identity,
      makeNode(identity, content, { parents: parentList(parent) }),
    );
    return identity;
  }

  async update(
    identity: RemoteIdentity,
    content: RevisionContent,
    parent: RemoteIdentity | null,
    options: UpdateOptions,
  ): Promise<void> {
    const suffix = options.includeDiff ? "" : " (metadata)";
    this.mutate(`update D${identity}${suffix}`);
    const existing = this.revisions.get(identity);
    const diffHash = options.includeDiff
      ? content.diff.contentHash
      : (existing?.diffHash ?? null);
    this.revisions.set(
      identity,
      makeNode(identity, content, { parents: parentList(parent), diffHash }),
    );
  }

  async setParent(
    identity: RemoteIdentity,
    parent: RemoteIdentity | null,
  ): Promise<void> {
    this.mutate(`reparent D${identity} parent=${describeParent(parent)}`);
    const existing = this.revisions.get(identity);
    if (existing) {
      this.revisions.set(identity, {
        ...existing,
        parents: parentList(parent),
      });
    }
  }

  async checkReviewers(reviewers: string[]): Promise<ReviewerProblem[]> {
    this.calls.push(`check ${reviewers.join(",")}`);
    return reviewers.flatMap((reviewer) => {
      const problem = this.reviewerProblems.get(reviewer.replace(/!+$/, ""));
      return problem ? [problem] : [];
    });
  }

  async ping(): Promise<void> {}

  async whoami(): Promise<ConduitUser> {
    return { phid: "PHID-USER-1", userName: "tester", realName: "Test User" };
  }
}

export function createMemoryIdentityStore(
  initial: IdentityCache = emptyIdentityCache(),
): IdentityStore & { saved: IdentityCache[] } {
  let current = initial;
  const saved: IdentityCache[] = [];
  return {
    saved,
    load: () => Promise.resolve(current),
    save: (cache) => {
      saved.push(cache);
      current = cache;
      return Promise.resolve();
    },
  };
}

export type FakeVcs = VcsFunctions & {
  commits: () => RawCommit[];
  amended: string[];
  clean: boolean;
};

interface FakeCommit {
  commit: RawCommit;
  changes: ChangedFileEntry[];
}

/**
 * A linear history of `messages` on top of a "base" commit. Content-addressed
 * ids change on every amend (the commit and its descendants gain a "'"), stable
 * ids keep the change id and only move the commit hash.
 */
export function createFakeVcs(
  messages: string[],
  identifiers: VcsFunctions["identifiers"] = "content-addressed",
): FakeVcs {
  const stable = identifiers === "stable";
  const history: FakeCommit[] = messages.map((message, index) => {
    const id = stable ? `change${index + 1}` : `c${index + 1}`;
    const hash = stable ? `commit${index + 1}` : id;
    const parent =
      index === 0 ? "base" : stable ? `change${index}` : `c${index}`;
    const parentHash =
      index === 0 ? "base" : stable ? `commit${index}` : `c${index}`;
    return {
      commit: {
        id,
        commitHash: hash,
        parents: [parent],
        parentHashes: [parentHash],
        message,
        author: TEST_AUTHOR,
      },
      changes: [addedFile(`file${index + 1}.txt`, `line ${index + 1}\n`)],
    };
  });

  const fake: FakeVcs = {
    name: stable ? "jj" : "git",
    identifiers,
    amended: [],
    clean: true,
    commits: () => history.map((entry) => ({ ...entry.commit })),
    resolveRange: () =>
      fake.currentHead().then((head) => ({ base: "base", head })),
    listCommits: () => Promise.resolve(fake.commits()),
    readChanges: (commit) => {
      const entry = history.find((e) => e.commit.id === commit.id);
      return Promise.resolve(entry ? entry.changes : []);
    },
    amendCommit: (localId, message) => {
      const index = history.findIndex((e) => e.commit.id === localId);
      if (index === -1) {
        return Promise.reject(new Error(`unknown commit ${localId}`));
      }
      fake.amended.push(localId);
      history[index].commit.message = message;
      if (stable) {
        history[index].commit.commitHash += "'";
        for (let i = index + 1; i < history.length; i++) {
          history[i].commit.commitHash += "'";
          history[i].commit.parentHashes = [history[i - 1].commit.commitHash];
        }
      } else {
        for (let i = index; i < history.length; i++) {
          const commit = history[i].commit;
          commit.id += "'";
          commit.commitHash = commit.id;
          if (i > index) {
            commit.parents = [history[i - 1].commit.id];
            commit.parentHashes = [history[i - 1].commit.id];
          }
        }
      }
      return Promise.resolve();
    },
    currentHead: () =>
      Promise.resolve(
        history.length ? history[history.length - 1].commit.id : "base",
      ),
    stateDir: () => Promise.resolve("/tmp/state"),
    isWorkingCopyClean: () => Promise.resolve(fake.clean),
  };
  return fake;
}
