import { join } from "path";
import * as v from "valibot";
import type { RawCommit } from "./stackTypes.js";
import type {
  RangeRequest,
  ResolvedRange,
  VcsFunctions,
} from "./vcs.js";
import { runCommand } from "./commandUtils.js";
import { StackError } from "./errors.js";
import { logger } from "./logger.js";

// AIDEV-NOTE: Configuration for JJ binary and the workspace it runs in
export interface JjConfig {
  binaryPath: string;
  cwd: string;
}

/**
 * Create configured jj VcsFunctions. File contents are read through `git`,
 * which must point at the colocated git repository.
 */
export function createJjFunctions(
  config: JjConfig,
  git: VcsFunctions,
): VcsFunctions {
  return {
    name: "jj",
    identifiers: "stable",
    resolveRange: (request) => resolveRange(config, request),
    listCommits: (range) => listCommits(config, range),
    readChanges: (commit, options) => git.readChanges(commit, options),
    amendCommit: (changeId, message) =>
      describeChange(config, changeId, message),
    currentHead: async () => (await resolveRevision(config, "@")).commitId,
    stateDir: async () => join((await jj(config, ["root"])).trim(), ".jj"),
    // jj snapshots the working copy on every command
    isWorkingCopyClean: () => Promise.resolve(true),
  };
}

function jj(
  config: JjConfig,
  args: string[],
  input?: string,
): Promise<string> {
  return runCommand(config.binaryPath, args, { cwd: config.cwd, input });
}

/**
 * Parse one JSON object per line, validating each against `schema`
 */
export function parseJsonLines<TSchema extends v.GenericSchema>(
  stdout: string,
  schema: TSchema,
): v.InferOutput<TSchema>[] {
  const entries: v.InferOutput<TSchema>[] = [];
  for (const line of stdout.trim().split("\n")) {
    if (line.trim() === "") continue;
    try {
      entries.push(v.parse(schema, JSON.parse(line)));
    } catch (parseError) {
      logger.error(`Failed to parse line: ${line}`, parseError);
      throw new Error(
        `Failed to parse JJ log output: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
      );
    }
  }
  return entries;
}

const RevisionSchema = v.object({
  commitId: v.string(),
  parentCommitIds: v.array(v.string()),
  empty: v.boolean(),
  description: v.string(),
});

const revisionTemplate = `'{ "commitId":' ++ stringify(commit_id).escape_json() ++ ', ' ++
'"parentCommitIds": [' ++ parents.map(|p| stringify(p.commit_id()).escape_json()).join(",") ++ '], ' ++
'"empty":' ++ empty ++ ', ' ++
'"description":' ++ description.escape_json() ++ ' }\n'`;

async function resolveRevisions(
  config: JjConfig,
  revset: string,
): Promise<v.InferOutput<typeof RevisionSchema>[]> {
  const stdout = await jj(config, [
    "log",
    "--no-graph",
    "--revisions",
    revset,
    "--template",
    revisionTemplate,
  ]);
  return parseJsonLines(stdout, RevisionSchema);
}

async function resolveRevision(
  config: JjConfig,
  revset: string,
): Promise<v.InferOutput<typeof RevisionSchema>> {
  const revisions = await resolveRevisions(config, revset);
  if (revisions.length !== 1) {
    throw new StackError(
      `Revset \`${revset}\` resolved to ${revisions.length} revisions, expected exactly one`,
    );
  }
  return revisions[0];
}

/**
 * `@` unless it is an empty, undescribed working-copy change
 */
async function defaultEnd(config: JjConfig): Promise<string> {
  const current = await resolveRevision(config, "@");
  return current.empty && current.description.trim() === "" ? "@-" : "@";
}

async function resolveRange(
  config: JjConfig,
  request: RangeRequest,
): Promise<ResolvedRange> {
  const end = request.end ?? (await defaultEnd(config));

  if (request.single) {
    const target = await resolveRevision(config, request.start ?? end);
    return { base: target.parentCommitIds[0] ?? null, head: target.commitId };
  }

  const head = await resolveRevision(config, end);
  const startRevset = request.start ?? `roots(immutable()..(${end}))`;
  const roots = await resolveRevisions(config, startRevset);
  if (roots.length === 0) {
    throw new StackError(
      `No mutable roots found (revset \`${startRevset}\`), unable to continue`,
    );
  }
  if (roots.length > 1) {
    throw new StackError(
      `Multiple mutable roots found (revset \`${startRevset}\`), unable to continue`,
    );
  }
  return { base: roots[0].parentCommitIds[0] ?? null, head: head.commitId };
}

const LogEntrySchema = v.object({
  changeId: v.string(),
  commitId: v.string(),
  parents: v.array(v.string()),
  parentCommitIds: v.array(v.string()),
  authorName: v.string(),
  authorEmail: v.string(),
  authoredAt: v.pipe(v.string(), v.isoTimestamp()),
  conflict: v.boolean(),
  description: v.string(),
});

const logTemplate = `'{ "changeId":' ++ stringify(change_id).escape_json() ++ ', ' ++
'"commitId":' ++ stringify(commit_id).escape_json() ++ ', ' ++
'"parents": [' ++ parents.map(|p| stringify(p.change_id()).escape_json()).join(",") ++ '], ' ++
'"parentCommitIds": [' ++ parents.map(|p| stringify(p.commit_id()).escape_json()).join(",") ++ '], ' ++
'"authorName":' ++ author.name().escape_json() ++ ', ' ++
'"authorEmail":' ++ stringify(author.email().local() ++ '@' ++ author.email().domain()).escape_json() ++ ', ' ++
'"authoredAt":' ++ author.timestamp().format('%+').escape_json() ++ ', ' ++
'"conflict":' ++ conflict ++ ', ' ++
'"description":' ++ description.escape_json() ++ ' }\n'`;

/**
 * Changes in the range, oldest first. Conflicted changes can't be reviewed.
 */
export function parseLogEntries(stdout: string): RawCommit[] {
  return parseJsonLines(stdout, LogEntrySchema).map((entry) => {
    if (entry.conflict) {
      throw new StackError(
        `Change ${entry.changeId} is conflicted, unable to continue`,
      );
    }
    return {
      id: entry.changeId,
      commitHash: entry.commitId,
      parents: entry.parents,
      parentHashes: entry.parentCommitIds,
      message: entry.description.trimEnd(),
      author: {
        name: entry.authorName,
        email: entry.authorEmail,
        date: entry.authoredAt,
      },
    };
  });
}

async function listCommits(
  config: JjConfig,
  range: ResolvedRange,
): Promise<RawCommit[]> {
  const revset = range.base
    ? `${range.base}..${range.head}`
    : `::${range.head}`;
  const stdout = await jj(config, [
    "log",
    "--no-graph",
    "--reversed",
    "--revisions",
    revset,
    "--template",
    logTemplate,
  ]);
  return parseLogEntries(stdout);
}

/**
 * Rewrite a change's description; the change id survives
 */
async function describeChange(
  config: JjConfig,
  changeId: string,
  message: string,
): Promise<void> {
  await jj(config, ["describe", changeId, "--stdin"], `${message.trimEnd()}\n`);
  logger.debug(`Described change ${changeId}`);
}
