import { TextDecoder } from "util";
import type { ChangeKind, ChangedFileEntry, RawCommit } from "./stackTypes.js";
import type {
  RangeRequest,
  ReadOptions,
  ResolvedRange,
  VcsFunctions,
} from "./vcs.js";
import {
  runCommand,
  runCommandBuffer,
  type RunOptions,
} from "./commandUtils.js";
import { CommandError, StackError } from "./errors.js";
import { logger } from "./logger.js";

export interface GitConfig {
  binaryPath: string;
  cwd: string;
  remotes: string[]; // git.remote from the config file
}

export const NULL_SHA = "0".repeat(40);
export const MAX_TEXT_SIZE = 10 * 1024 * 1024;
export const MAX_CONTEXT_SIZE = 4 * 1024 * 1024;
export const LESS_CONTEXT_LINES = 100;

const FIELD = "\x1f";
const LOG_FORMAT = ["%H", "%P", "%an", "%ae", "%ad", "%B"].join("%x1f");

/**
 * Create configured git VcsFunctions
 */
export function createGitFunctions(config: GitConfig): VcsFunctions {
  return {
    name: "git",
    identifiers: "content-addressed",
    resolveRange: (request) => resolveRange(config, request),
    listCommits: (range) => listCommits(config, range),
    readChanges: (commit, options) => readChanges(config, commit, options),
    amendCommit: (localId, message) => amendCommit(config, localId, message),
    currentHead: () => revParse(config, "HEAD"),
    stateDir: async () =>
      (await git(config, ["rev-parse", "--absolute-git-dir"])).trim(),
    isWorkingCopyClean: async () =>
      (
        await git(config, ["status", "--porcelain", "--untracked-files=no"])
      ).trim() === "",
  };
}

function git(
  config: GitConfig,
  args: string[],
  options: Omit<RunOptions, "cwd"> = {},
): Promise<string> {
  return runCommand(config.binaryPath, args, { cwd: config.cwd, ...options });
}

async function revParse(config: GitConfig, rev: string): Promise<string> {
  return (
    await git(config, ["rev-parse", "--verify", `${rev}^{commit}`])
  ).trim();
}

async function parentsOf(config: GitConfig, rev: string): Promise<string[]> {
  const line = (
    await git(config, ["rev-list", "--parents", "-n", "1", rev])
  ).trim();
  return line.split(" ").slice(1);
}

/**
 * Remotes whose branches count as published
 */
async function getBaseRemotes(
  config: GitConfig,
  upstreams: string[],
): Promise<string[]> {
  if (upstreams.length) {
    logger.debug(`Using remotes from --upstream: ${upstreams.join(", ")}`);
    return upstreams;
  }
  if (config.remotes.length) {
    logger.debug(
      `Using remotes from git.remote config: ${config.remotes.join(", ")}`,
    );
    return config.remotes;
  }

  const remotes = (await git(config, ["remote"])).split("\n").filter(Boolean);
  if (remotes.length === 1) {
    return remotes;
  }
  if (remotes.includes("origin")) {
    logger.warn(
      "Multiple remotes found, defaulting to 'origin'. Set git.remote to pick another.",
    );
    return ["origin"];
  }
  logger.warn(
    "Multiple remotes found and no 'origin'; treating all of them as upstream.",
  );
  return remotes;
}

/**
 * The oldest commit reachable from `head` that no upstream remote branch contains
 */
async function getFirstUnpublishedCommit(
  config: GitConfig,
  head: string,
  remotes: string[],
): Promise<string | null> {
  const remoteArgs = remotes.length
    ? remotes.map((remote) => `--remotes=${remote}`)
    : ["--remotes"];
  const refs = (
    await git(config, [
      "rev-list",
      head,
      "--topo-order",
      "--boundary",
      "--not",
      ...remoteArgs,
    ])
  )
    .split("\n")
    .filter(Boolean);

  for (const ref of refs.reverse()) {
    if (!ref.startsWith("-")) {
      return ref;
    }
  }
  return null;
}

async function resolveRange(
  config: GitConfig,
  request: RangeRequest,
): Promise<ResolvedRange> {
  if (request.single) {
    const target = await revParse(
      config,
      request.start ?? request.end ?? "HEAD",
    );
    return { base: (await parentsOf(config, target))[0] ?? null, head: target };
  }

  const head = await revParse(config, request.end ?? "HEAD");
  const first = request.start
    ? await revParse(config, request.start)
    : await getFirstUnpublishedCommit(
        config,
        head,
        await getBaseRemotes(config, request.upstreams),
      );
  if (!first) {
    throw new StackError("Failed to find any unpublished commits to submit");
  }
  return { base: (await parentsOf(config, first))[0] ?? null, head };
}

/**
 * Parse `git log -z` output written with LOG_FORMAT
 */
export function parseLogOutput(stdout: string): RawCommit[] {
  return stdout
    .split("\0")
    .filter((entry) => entry.trim() !== "")
    .map((entry) => {
      const fields = entry.split(FIELD);
      if (fields.length < 6) {
        throw new Error(
          `Failed to parse git log entry: ${JSON.stringify(entry)}`,
        );
      }
      const [hash, parents, name, email, date, ...message] = fields;
      const parentHashes = parents.trim() ? parents.trim().split(" ") : [];
      return {
        id: hash.trim(),
        commitHash: hash.trim(),
        parents: parentHashes,
        parentHashes,
        message: message.join(FIELD).trimEnd(),
        author: { name, email, date },
      };
    });
}

async function listCommits(
  config: GitConfig,
  range: ResolvedRange,
): Promise<RawCommit[]> {
  const args = [
    "log",
    "-z",
    "--reverse",
    "--date=raw",
    `--format=${LOG_FORMAT}`,
  ];
  if (range.base) {
    args.push("--ancestry-path", `${range.base}..${range.head}`);
  } else {
    args.push(range.head);
  }
  return parseLogOutput(await git(config, args));
}

export interface RawChange {
  oldMode: string;
  newMode: string;
  oldBlob: string;
  newBlob: string;
  status: string;
  oldPath: string;
  newPath: string;
}

/**
 * Parse `git diff-tree --raw -z --no-commit-id` output
 */
export function parseRawDiffTree(stdout: string): RawChange[] {
  const tokens = stdout.split("\0");
  const changes: RawChange[] = [];
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (!token.startsWith(":")) {
      i++;
      continue;
    }
    const [oldMode, newMode, oldBlob, newBlob, status] = token
      .slice(1)
      .split(" ");
    const modes = { oldMode, newMode, oldBlob, newBlob, status };
    if (status[0] === "R" || status[0] === "C") {
      changes.push({
        ...modes,
        oldPath: tokens[i + 1],
        newPath: tokens[i + 2],
      });
      i += 3;
    } else {
      changes.push({
        ...modes,
        oldPath: tokens[i + 1],
        newPath: tokens[i + 1],
      });
      i += 2;
    }
  }
  return changes;
}

function changeKind(status: string): ChangeKind {
  switch (status[0]) {
    case "A":
      return "add";
    case "D":
      return "delete";
    case "R":
      return "rename";
    case "C":
      return "copy";
    default:
      return "modify";
  }
}

/**
 * Decode UTF-8, or null when the bytes are not valid UTF-8
 */
function decodeText(bytes: Buffer): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    logger.debug(`Content is not valid UTF-8: ${String(error)}`);
    return null;
  }
}

function catFile(config: GitConfig, blob: string): Promise<Buffer> {
  return runCommandBuffer(config.binaryPath, ["cat-file", "blob", blob], {
    cwd: config.cwd,
  });
}

async function buildEntry(
  config: GitConfig,
  raw: RawChange,
  options: ReadOptions,
): Promise<ChangedFileEntry> {
  const oldBlob = raw.oldBlob === NULL_SHA ? null : raw.oldBlob;
  const newBlob = raw.newBlob === NULL_SHA ? null : raw.newBlob;
  const oldBytes = oldBlob ? await catFile(config, oldBlob) : Buffer.alloc(0);
  const newBytes = newBlob ? await catFile(config, newBlob) : Buffer.alloc(0);
  const fileSize = Math.max(oldBytes.length, newBytes.length);

  const kind = changeKind(raw.status);
  const entry = {
    path: raw.newPath,
    oldPath: kind === "add" ? null : raw.oldPath,
    kind,
    oldMode: oldBlob ? raw.oldMode : null,
    newMode: newBlob ? raw.newMode : null,
  };

  const oldText = decodeText(oldBytes);
  const newText = decodeText(newBytes);
  if (
    oldBytes.includes(0) ||
    newBytes.includes(0) ||
    fileSize > MAX_TEXT_SIZE ||
    oldText === null ||
    newText === null
  ) {
    return {
      ...entry,
      content: {
        type: "binary",
        oldBytes: oldBlob ? oldBytes : null,
        newBytes: newBlob ? newBytes : null,
      },
    };
  }

  let diff: string | null = null;
  if (oldBlob && newBlob && oldBlob !== newBlob) {
    const context =
      options.lessContext || fileSize > MAX_CONTEXT_SIZE
        ? LESS_CONTEXT_LINES
        : MAX_CONTEXT_SIZE;
    diff = await git(config, [
      "diff",
      "--submodule=short",
      "--no-ext-diff",
      "--no-color",
      "--no-textconv",
      `-U${context}`,
      oldBlob,
      newBlob,
    ]);
  }
  return { ...entry, content: { type: "text", oldText, newText, diff } };
}

/**
 * `git diff-tree` arguments comparing a commit with its first parent, or
 * with the empty tree for a root commit
 */
export function diffTreeArgs(
  commit: Pick<RawCommit, "commitHash" | "parentHashes">,
): string[] {
  const [firstParent] = commit.parentHashes;
  return [
    "diff-tree",
    "-r",
    "--no-commit-id",
    "--raw",
    "-z",
    "-M",
    "-C",
    "--no-abbrev",
    ...(firstParent === undefined
      ? ["--root", commit.commitHash]
      : [firstParent, commit.commitHash]),
  ];
}

/**
 * Read every file a commit changes compared to its first parent. Merges
 * are diffed the same way.
 */
export async function readChanges(
  config: GitConfig,
  commit: Pick<RawCommit, "commitHash" | "parentHashes">,
  options: ReadOptions,
): Promise<ChangedFileEntry[]> {
  const raw = await git(config, diffTreeArgs(commit));
  const entries: ChangedFileEntry[] = [];
  for (const change of parseRawDiffTree(raw)) {
    entries.push(await buildEntry(config, change, options));
  }
  return entries;
}

interface CommitInfo {
  tree: string;
  parents: string[];
  authorName: string;
  authorEmail: string;
  authorDate: string;
  message: string;
}

async function readCommit(
  config: GitConfig,
  hash: string,
): Promise<CommitInfo> {
  const out = await git(config, [
    "show",
    "-s",
    "--date=raw",
    `--format=${["%T", "%P", "%an", "%ae", "%ad", "%B"].join("%x1f")}`,
    hash,
  ]);
  const [tree, parents, authorName, authorEmail, authorDate, ...message] =
    out.split(FIELD);
  return {
    tree: tree.trim(),
    parents: parents.trim() ? parents.trim().split(" ") : [],
    authorName,
    authorEmail,
    authorDate,
    message: message.join(FIELD).trimEnd(),
  };
}

async function commitTree(
  config: GitConfig,
  info: CommitInfo,
  parents: string[],
  message: string,
): Promise<string> {
  const out = await git(
    config,
    [
      "commit-tree",
      info.tree,
      ...parents.flatMap((parent) => ["-p", parent]),
      "-F",
      "-",
    ],
    {
      input: `${message.trimEnd()}\n`,
      env: {
        GIT_AUTHOR_NAME: info.authorName,
        GIT_AUTHOR_EMAIL: info.authorEmail,
        GIT_AUTHOR_DATE: info.authorDate,
      },
    },
  );
  return out.trim();
}

/**
 * Replace a commit's message, rebuild every commit between it and HEAD on
 * top of the rewritten one, then move HEAD. Trees are reused, so the
 * working copy and index stay as they are.
 */
async function amendCommit(
  config: GitConfig,
  commitHash: string,
  message: string,
): Promise<void> {
  const head = await revParse(config, "HEAD");
  try {
    await git(config, ["merge-base", "--is-ancestor", commitHash, head]);
  } catch (error) {
    if (error instanceof CommandError && error.status === 1) {
      throw new StackError(`Commit ${commitHash} is not an ancestor of HEAD`);
    }
    throw error;
  }

  const descendants = (
    await git(config, [
      "rev-list",
      "--reverse",
      "--topo-order",
      "--ancestry-path",
      `${commitHash}..${head}`,
    ])
  )
    .split("\n")
    .filter(Boolean);

  const target = await readCommit(config, commitHash);
  let rewritten = await commitTree(config, target, target.parents, message);
  logger.debug(`Rewrote ${commitHash} as ${rewritten}`);

  for (const descendant of descendants) {
    const info = await readCommit(config, descendant);
    if (info.parents.length > 1) {
      throw new StackError(
        `Cannot rewrite merge commit ${descendant} above ${commitHash}`,
      );
    }
    rewritten = await commitTree(config, info, [rewritten], info.message);
  }

  await git(config, [
    "update-ref",
    "-m",
    "phab-stack: amend commit message",
    "HEAD",
    rewritten,
    head,
  ]);
}
