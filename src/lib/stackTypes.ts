// AIDEV-NOTE: Revision number on the review server (D123 -> 123)
export type RemoteIdentity = number;

export interface Author {
  name: string;
  email: string;
  date: string; // VCS-native date string, passed back unchanged when amending
}

export type ChangeKind = "add" | "modify" | "delete" | "rename" | "copy";

export type FileContent =
  | { type: "text"; oldText: string; newText: string; diff: string | null }
  | { type: "binary"; oldBytes: Buffer | null; newBytes: Buffer | null };

export interface ChangedFileEntry {
  path: string;
  oldPath: string | null; // Same as path for modify/delete, null for add
  kind: ChangeKind;
  oldMode: string | null;
  newMode: string | null;
  content: FileContent;
}

/**
 * A commit as listed by the VCS, before it is placed in a stack
 */
export interface RawCommit {
  id: string; // git SHA-1 or jj change id
  commitHash: string;
  parents: string[];
  parentHashes: string[];
  message: string;
  author: Author;
}

export interface CommitDescriptor {
  localId: string;
  commitHash: string;
  baseCommitHash: string | null;
  ordinal: number;
  title: string;
  body: string;
  message: string;
  author: Author;
  changes: ChangedFileEntry[];
  parent: string | null; // AIDEV-NOTE: null for the stack root, even when it has a VCS parent
  identity: RemoteIdentity | null;
}

export type RevisionStatus = "open" | "closed" | "abandoned";

export interface RemoteGraphNode {
  identity: RemoteIdentity;
  phid: string;
  parents: RemoteIdentity[]; // Every revision.parent edge the server holds
  diffHash: string | null;
  status: RevisionStatus;
  reviewStatus: string; // Server status value, e.g. "needs-review" or "changes-planned"
  hasReviewers: boolean;
  bugId: string | null;
  title: string;
  summary: string;
}

export interface ConduitHunk {
  oldOffset: number;
  oldLength: number;
  newOffset: number;
  newLength: number;
  addLines: number;
  delLines: number;
  isMissingOldNewline: boolean;
  isMissingNewNewline: boolean;
  corpus: string;
}

export const ChangeType = {
  ADD: 1,
  CHANGE: 2,
  DELETE: 3,
  MOVE_AWAY: 4,
  COPY_AWAY: 5,
  MOVE_HERE: 6,
  COPY_HERE: 7,
  MULTICOPY: 8,
} as const;
export type ChangeType = (typeof ChangeType)[keyof typeof ChangeType];

export const FileType = {
  TEXT: 1,
  IMAGE: 2,
  BINARY: 3,
} as const;
export type FileType = (typeof FileType)[keyof typeof FileType];

export interface ConduitChange {
  metadata: Record<string, string | number>;
  oldPath: string | null;
  currentPath: string;
  awayPaths: string[];
  oldProperties: Record<string, string>;
  newProperties: Record<string, string>;
  type: ChangeType;
  fileType: FileType;
  hunks: ConduitHunk[];
}

export interface BinaryUpload {
  changePath: string; // currentPath of the change the upload belongs to
  fileName: string;
  side: "old" | "new";
  bytes: Buffer;
  mimeType: string;
}

export interface TransformedDiff {
  commitHash: string;
  baseCommitHash: string | null;
  changes: ConduitChange[];
  uploads: BinaryUpload[];
  contentHash: string;
}

export interface RevisionContent {
  title: string;
  summary: string;
  diff: TransformedDiff;
  reviewers: string[]; // Blocking reviewers carry a trailing "!"
  wip: boolean;
  bugId: string | null;
}

export type ParentRef =
  | { type: "root" }
  | { type: "identity"; identity: RemoteIdentity }
  | { type: "output"; operationIndex: number };

export type UpdateReason = "content" | "metadata" | "forced";

export type PlanOperation =
  | {
      type: "create";
      ordinal: number;
      content: RevisionContent;
      parent: ParentRef;
      replaces: RemoteIdentity | null; // Closed revision this one stands in for
    }
  | {
      type: "update";
      ordinal: number;
      identity: RemoteIdentity;
      content: RevisionContent;
      parent: ParentRef;
      reason: UpdateReason;
    }
  | {
      type: "reparent";
      ordinal: number;
      identity: RemoteIdentity;
      parent: ParentRef;
    };

export interface ReconciliationPlan {
  operations: PlanOperation[];
  warnings: string[];
  inSync: number[];
  bindings: Map<number, RemoteIdentity | null>; // ordinal -> identity the plan keeps
}
