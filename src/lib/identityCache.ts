import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import * as v from "valibot";
import type { RemoteIdentity } from "./stackTypes.js";
import { logger } from "./logger.js";

export const MAX_CACHE_ENTRIES = 500;

/**
 * Identities recorded by earlier runs. `commits` maps commit hashes to the
 * revision they were submitted as; `stack` is the last submitted order.
 */
export interface IdentityCache {
  commits: Map<string, RemoteIdentity>;
  stack: RemoteIdentity[];
}

// Types for dependency injection
export type IdentityStore = {
  load: () => Promise<IdentityCache>;
  save: (cache: IdentityCache) => Promise<void>;
};

const IdentityCacheFileSchema = v.object({
  version: v.literal(1),
  commits: v.record(v.string(), v.pipe(v.number(), v.integer(), v.minValue(1))),
  stack: v.array(v.pipe(v.number(), v.integer(), v.minValue(1))),
});

export function emptyIdentityCache(): IdentityCache {
  return { commits: new Map(), stack: [] };
}

/**
 * Add bindings to a cache, keeping the newest MAX_CACHE_ENTRIES
 */
export function recordIdentities(
  cache: IdentityCache,
  bindings: Array<{ commitHash: string; identity: RemoteIdentity }>,
  stack: RemoteIdentity[],
): IdentityCache {
  const commits = new Map(cache.commits);
  for (const { commitHash, identity } of bindings) {
    // Re-insert so recently used entries survive trimming
    commits.delete(commitHash);
    commits.set(commitHash, identity);
  }
  const overflow = commits.size - MAX_CACHE_ENTRIES;
  if (overflow > 0) {
    for (const key of [...commits.keys()].slice(0, overflow)) {
      commits.delete(key);
    }
  }
  return { commits, stack: [...stack] };
}

export function identityCachePath(stateDir: string): string {
  return join(stateDir, "phab-stack", "identities.json");
}

export function parseIdentityCache(text: string): IdentityCache {
  const data = v.parse(IdentityCacheFileSchema, JSON.parse(text));
  return {
    commits: new Map(Object.entries(data.commits)),
    stack: data.stack,
  };
}

export function serializeIdentityCache(cache: IdentityCache): string {
  return JSON.stringify(
    {
      version: 1,
      commits: Object.fromEntries(cache.commits),
      stack: cache.stack,
    },
    null,
    2,
  );
}

/**
 * Store the cache as JSON at `path`. A missing or unreadable file loads as
 * an empty cache; the markers in commit messages remain authoritative.
 */
export function createFileIdentityStore(path: string): IdentityStore {
  return {
    load: async () => {
      let text: string;
      try {
        text = await readFile(path, "utf8");
      } catch (error) {
        if (
          error instanceof Error &&
          "code" in error &&
          error.code === "ENOENT"
        ) {
          return emptyIdentityCache();
        }
        throw error;
      }
      try {
        return parseIdentityCache(text);
      } catch (error) {
        logger.warn(
          `Ignoring invalid identity cache at ${path}: ${String(error)}`,
        );
        return emptyIdentityCache();
      }
    },
    save: async (cache) => {
      await mkdir(dirname(path), { recursive: true });
      const temporary = `${path}.tmp`;
      await writeFile(temporary, `${serializeIdentityCache(cache)}\n`, "utf8");
      await rename(temporary, path);
    },
  };
}
