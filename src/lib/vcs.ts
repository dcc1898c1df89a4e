import { stat } from "fs/promises";
import { dirname, join } from "path";
import type { ChangedFileEntry, RawCommit } from "./stackTypes.js";
import { StackError } from "./errors.js";
import { createGitFunctions } from "./gitUtils.js";
import { createJjFunctions } from "./jjUtils.js";
import { logger } from "./logger.js";

/**
 * Commits after `base` (exclusive, null for the repository root) up to and including `head`
 */
export interface ResolvedRange {
  base: string | null;
  head: string;
}

export interface RangeRequest {
  start: string | null; // inclusive
  end: string | null;
  single: boolean;
  upstreams: string[];
}

export interface ReadOptions {
  lessContext: boolean;
}

// Types for dependency injection
export type VcsFunctions = {
  name: "git" | "jj";
  // AIDEV-NOTE: "content-addressed" ids change on amend, "stable" ones survive it
  identifiers: "content-addressed" | "stable";
  resolveRange: (request: RangeRequest) => Promise<ResolvedRange>;
  listCommits: (range: ResolvedRange) => Promise<RawCommit[]>;
  readChanges: (
    commit: RawCommit,
    options: ReadOptions,
  ) => Promise<ChangedFileEntry[]>;
  amendCommit: (localId: string, message: string) => Promise<void>;
  currentHead: () => Promise<string>;
  stateDir: () => Promise<string>;
  isWorkingCopyClean: () => Promise<boolean>;
};

export interface RepositoryInfo {
  kind: "git" | "jj";
  root: string;
}

export interface VcsConfig {
  git: { binaryPath: string; remotes: string[] };
  jj: { binaryPath: string };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Walk up from `path` to the closest repository. A jj workspace wins over
 * the git repository it is colocated with.
 */
export async function detectRepository(path: string): Promise<RepositoryInfo> {
  let current = path;
  while (true) {
    if (await exists(join(current, ".jj"))) {
      return { kind: "jj", root: current };
    }
    if (await exists(join(current, ".git"))) {
      return { kind: "git", root: current };
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new StackError(`${path} is not inside a git or jj repository`);
    }
    current = parent;
  }
}

/**
 * Create configured VcsFunctions for a detected repository
 */
export function createVcsFunctions(
  repository: RepositoryInfo,
  config: VcsConfig,
): VcsFunctions {
  logger.debug(`Using ${repository.kind} repository at ${repository.root}`);
  const git = createGitFunctions({
    binaryPath: config.git.binaryPath,
    remotes: config.git.remotes,
    cwd: repository.root,
  });
  if (repository.kind === "git") {
    return git;
  }
  return createJjFunctions(
    { binaryPath: config.jj.binaryPath, cwd: repository.root },
    git,
  );
}
