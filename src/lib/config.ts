import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import * as v from "valibot";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

const ConfigFileSchema = v.object({
  submit: v.optional(
    v.object({
      autoSubmit: v.optional(v.boolean(), false),
      alwaysBlocking: v.optional(v.boolean(), false),
      requireBugId: v.optional(v.boolean(), false),
    }),
    {},
  ),
  git: v.optional(
    v.object({
      remote: v.optional(v.array(v.string()), []),
      binaryPath: v.optional(v.string(), "git"),
    }),
    {},
  ),
  jj: v.optional(
    v.object({
      binaryPath: v.optional(v.string(), "jj"),
    }),
    {},
  ),
});
export type SubmitConfig = v.InferOutput<typeof ConfigFileSchema>;

const ArcConfigSchema = v.object({
  "phabricator.uri": v.pipe(v.string(), v.url()),
  "repository.callsign": v.optional(v.string()),
});

export interface ArcConfig {
  url: string;
  callsign: string | null;
}

type Environment = Record<string, string | undefined>;

export function configFilePath(
  env: Environment = process.env,
  home = homedir(),
): string {
  return (
    env.PHAB_STACK_CONFIG ||
    join(home, ".config", "phab-stack", "config.json")
  );
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

function parseJsonFile<TSchema extends v.GenericSchema>(
  schema: TSchema,
  text: string,
  path: string,
): v.InferOutput<TSchema> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const result = v.safeParse(schema, data);
  if (!result.success) {
    const issues = result.issues
      .map((issue) => {
        const key = v.getDotPath(issue);
        return key ? `${key}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new ConfigError(`Invalid ${path}: ${issues}`);
  }
  return result.output;
}

export function parseConfig(text: string, path = "config.json"): SubmitConfig {
  return parseJsonFile(ConfigFileSchema, text, path);
}

/**
 * Load the user's config file, falling back to the defaults when it doesn't exist
 */
export async function loadConfig(
  env: Environment = process.env,
  home = homedir(),
): Promise<SubmitConfig> {
  const path = configFilePath(env, home);
  const text = await readOptionalFile(path);
  if (text === null) {
    logger.debug(`No config file at ${path}, using defaults`);
    return parseConfig("{}", path);
  }
  return parseConfig(text, path);
}

export function parseArcConfig(text: string, path = ".arcconfig"): ArcConfig {
  const data = parseJsonFile(ArcConfigSchema, text, path);
  return {
    url: data["phabricator.uri"],
    callsign: data["repository.callsign"] || null,
  };
}

/**
 * Read `.arcconfig` from the repository root
 */
export async function loadArcConfig(root: string): Promise<ArcConfig> {
  const path = join(root, ".arcconfig");
  const text = await readOptionalFile(path);
  if (text === null) {
    throw new ConfigError(
      `No .arcconfig found in ${root}. Add one with "phabricator.uri" set to your Phabricator server.`,
    );
  }
  return parseArcConfig(text, path);
}

const ArcrcSchema = v.object({
  hosts: v.optional(
    v.record(v.string(), v.object({ token: v.optional(v.string()) })),
    {},
  ),
});

export function conduitApiUrl(url: string): string {
  return new URL("api/", url.endsWith("/") ? url : `${url}/`).toString();
}

/**
 * Token for `url` from an `~/.arcrc`'s hosts, keyed by API URL
 */
export function parseArcrcToken(
  text: string,
  url: string,
  path = ".arcrc",
): string | null {
  const { hosts } = parseJsonFile(ArcrcSchema, text, path);
  return hosts[conduitApiUrl(url)]?.token ?? null;
}

export async function loadArcrcToken(
  url: string,
  home = homedir(),
): Promise<string | null> {
  const path = join(home, ".arcrc");
  const text = await readOptionalFile(path);
  return text === null ? null : parseArcrcToken(text, url, path);
}
