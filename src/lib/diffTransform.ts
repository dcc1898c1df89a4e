import { createHash } from "crypto";
import { basename } from "path";
import mime from "mime-types";
import type {
  BinaryUpload,
  ChangedFileEntry,
  CommitDescriptor,
  ConduitChange,
  ConduitHunk,
  TransformedDiff,
} from "./stackTypes.js";
import { ChangeType, FileType } from "./stackTypes.js";

const NO_NEWLINE = "\\ No newline at end of file\n";
const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Split text into lines that keep their terminators
 */
function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Prefix every line of `body`. With `markMissingNewline`, a final line without
 * a terminator gets one plus the "\ No newline" marker line.
 */
export function createHunkLines(
  body: string,
  prefix: "+" | "-" | " ",
  markMissingNewline = true,
): { lines: string[]; missingNewline: boolean } {
  const lines = splitLines(body).map((line) => prefix + line);
  const last = lines.length - 1;
  if (markMissingNewline && last >= 0 && !lines[last].endsWith("\n")) {
    lines[last] += "\n";
    lines.push(NO_NEWLINE);
    return { lines, missingNewline: true };
  }
  return { lines, missingNewline: false };
}

/**
 * Build a hunk, deriving line counts and end-of-file flags from its lines
 */
export function buildHunk(
  lines: string[],
  oldOffset: number,
  oldLength: number,
  newOffset: number,
  newLength: number,
): ConduitHunk {
  let isMissingOldNewline = false;
  let isMissingNewNewline = false;
  let previous = " ";
  for (const line of lines) {
    if (line.endsWith("No newline at end of file\n")) {
      if (previous[0] !== "+") isMissingOldNewline = true;
      if (previous[0] !== "-") isMissingNewNewline = true;
    }
    previous = line;
  }
  return {
    oldOffset,
    oldLength,
    newOffset,
    newLength,
    addLines: lines.filter((line) => line[0] === "+").length,
    delLines: lines.filter((line) => line[0] === "-").length,
    isMissingOldNewline,
    isMissingNewNewline,
    corpus: lines.join(""),
  };
}

/**
 * Parse the hunks of a unified diff produced by `git diff`
 */
export function parseUnifiedDiff(diff: string): ConduitHunk[] {
  const hunks: ConduitHunk[] = [];
  let header: RegExpExecArray | null = null;
  let lines: string[] = [];

  const flush = () => {
    if (!header) return;
    hunks.push(
      buildHunk(
        lines,
        Number(header[1]),
        Number(header[2] ?? 1),
        Number(header[3]),
        Number(header[4] ?? 1),
      ),
    );
  };

  for (const line of splitLines(diff)) {
    const match = HUNK_HEADER_RE.exec(line);
    if (match) {
      flush();
      header = match;
      lines = [];
    } else if (header) {
      lines.push(line);
    }
  }
  flush();
  return hunks;
}

function textHunks(
  entry: ChangedFileEntry,
  oldText: string,
  newText: string,
  diff: string | null,
): ConduitHunk[] {
  if (entry.kind === "add") {
    const { lines, missingNewline } = createHunkLines(newText, "+");
    if (!lines.length) return [];
    return [buildHunk(lines, 0, 0, 1, lines.length - (missingNewline ? 1 : 0))];
  }
  if (entry.kind === "delete") {
    const { lines, missingNewline } = createHunkLines(oldText, "-");
    if (!lines.length) return [];
    return [buildHunk(lines, 1, lines.length - (missingNewline ? 1 : 0), 0, 0)];
  }
  if (diff === null) {
    // Mode change or pure rename/copy: the content is shown as context
    const { lines } = createHunkLines(oldText, " ", false);
    if (!lines.length) return [];
    return [buildHunk(lines, 1, lines.length, 1, lines.length)];
  }
  return parseUnifiedDiff(diff);
}

function guessMimeType(path: string): string {
  return mime.lookup(path) || "";
}

interface ChangeDraft extends ConduitChange {
  uploads: BinaryUpload[];
}

function emptyChange(path: string): ChangeDraft {
  return {
    metadata: {},
    oldPath: null,
    currentPath: path,
    awayPaths: [],
    oldProperties: {},
    newProperties: {},
    type: ChangeType.CHANGE,
    fileType: FileType.TEXT,
    hunks: [],
    uploads: [],
  };
}

function setModes(
  change: ChangeDraft,
  oldMode: string | null,
  newMode: string | null,
) {
  if (oldMode !== newMode) {
    if (oldMode) change.oldProperties = { "unix:filemode": oldMode };
    if (newMode) change.newProperties = { "unix:filemode": newMode };
  }
}

/**
 * Convert a commit's changed files into the change list `differential.creatediff` takes
 */
export function transformChanges(entries: ChangedFileEntry[]): {
  changes: ConduitChange[];
  uploads: BinaryUpload[];
} {
  const drafts = new Map<string, ChangeDraft>();
  const changeFor = (path: string): ChangeDraft => {
    let draft = drafts.get(path);
    if (!draft) {
      draft = emptyChange(path);
      drafts.set(path, draft);
    }
    return draft;
  };

  for (const entry of entries) {
    const change = changeFor(entry.path);
    const sourcePath = entry.oldPath ?? entry.path;

    if (entry.content.type === "binary") {
      const oldMime = guessMimeType(sourcePath);
      const newMime = guessMimeType(entry.path);
      const sides: Array<
        [BinaryUpload["side"], Buffer | null, string, string]
      > = [
        ["old", entry.content.oldBytes, oldMime, sourcePath],
        ["new", entry.content.newBytes, newMime, entry.path],
      ];
      for (const [side, bytes, mimeType, path] of sides) {
        if (!bytes || bytes.length === 0) continue;
        change.uploads.push({
          changePath: entry.path,
          fileName: basename(path),
          side,
          bytes,
          mimeType,
        });
        change.metadata[`${side}:file:size`] = bytes.length;
        change.metadata[`${side}:file:mime-type`] = mimeType;
      }
      change.fileType =
        oldMime.startsWith("image/") || newMime.startsWith("image/")
          ? FileType.IMAGE
          : FileType.BINARY;
    } else {
      const { oldText, newText, diff } = entry.content;
      change.hunks = textHunks(entry, oldText, newText, diff);
      change.fileType = FileType.TEXT;
    }

    switch (entry.kind) {
      case "add":
        change.type = ChangeType.ADD;
        if (entry.newMode) {
          change.newProperties = { "unix:filemode": entry.newMode };
        }
        break;
      case "delete":
        change.type = ChangeType.DELETE;
        change.oldPath = sourcePath;
        if (entry.oldMode) {
          change.oldProperties = { "unix:filemode": entry.oldMode };
        }
        break;
      case "modify":
        change.type = ChangeType.CHANGE;
        change.oldPath = sourcePath;
        setModes(change, entry.oldMode, entry.newMode);
        break;
      case "rename": {
        change.type = ChangeType.MOVE_HERE;
        change.oldPath = sourcePath;
        setModes(change, entry.oldMode, entry.newMode);
        const away = changeFor(sourcePath);
        if (
          away.type === ChangeType.MOVE_AWAY ||
          away.type === ChangeType.COPY_AWAY
        ) {
          away.type = ChangeType.MULTICOPY;
        } else if (away.type !== ChangeType.MULTICOPY) {
          away.type = ChangeType.MOVE_AWAY;
        }
        away.awayPaths.push(entry.path);
        break;
      }
      case "copy": {
        change.type = ChangeType.COPY_HERE;
        change.oldPath = sourcePath;
        setModes(change, entry.oldMode, entry.newMode);
        const away = changeFor(sourcePath);
        if (away.type !== ChangeType.MULTICOPY) {
          away.type = ChangeType.COPY_AWAY;
        }
        away.awayPaths.push(entry.path);
        break;
      }
    }
  }

  const sorted = [...drafts.values()].sort((a, b) =>
    a.currentPath < b.currentPath ? -1 : a.currentPath > b.currentPath ? 1 : 0,
  );
  return {
    changes: sorted.map(({ uploads: _uploads, ...change }) => change),
    uploads: sorted.flatMap((draft) => draft.uploads),
  };
}

/**
 * SHA-256 over the change list and upload bytes. Commit hashes are left out,
 * so rewording a commit keeps its hash.
 */
export function computeContentHash(
  changes: ConduitChange[],
  uploads: BinaryUpload[],
): string {
  const hash = createHash("sha256");
  hash.update(JSON.stringify(changes));
  for (const upload of uploads) {
    hash.update(`\0${upload.side}:${upload.changePath}\0`);
    hash.update(upload.bytes);
  }
  return hash.digest("hex");
}

export function transformDiff(descriptor: CommitDescriptor): TransformedDiff {
  const { changes, uploads } = transformChanges(descriptor.changes);
  return {
    commitHash: descriptor.commitHash,
    baseCommitHash: descriptor.baseCommitHash,
    changes,
    uploads,
    contentHash: computeContentHash(changes, uploads),
  };
}
