import type { SubmitOptions } from "../lib/submit.js";
import { UsageError } from "../lib/errors.js";

export interface SubmitArgs {
  options: SubmitOptions;
  yes: boolean;
  dryRun: boolean;
  path: string;
}

export type Command =
  | { command: "help" }
  | { command: "auth"; subcommand: "test" | "help" }
  | ({ command: "submit" } & SubmitArgs);

const BOOLEAN_FLAGS: Record<string, string | undefined> = {
  "--yes": "yes",
  "-y": "yes",
  "--force": "force",
  "-f": "force",
  "--dry-run": "dryRun",
  "--single": "single",
  "-s": "single",
  "--wip": "wip",
  "--no-wip": "noWip",
  "--less-context": "lessContext",
  "--allow-reorder": "allowReorder",
  "--no-bug": "noBug",
};

type ValueFlag =
  | "reviewer"
  | "blocker"
  | "upstream"
  | "message"
  | "path"
  | "bug";

const VALUE_FLAGS: Record<string, ValueFlag | undefined> = {
  "--reviewer": "reviewer",
  "-r": "reviewer",
  "--blocker": "blocker",
  "-R": "blocker",
  "--upstream": "upstream",
  "-u": "upstream",
  "--message": "message",
  "-m": "message",
  "--path": "path",
  "-p": "path",
  "--bug": "bug",
  "-b": "bug",
};

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse `submit` arguments: up to two revisions plus flags. Value flags take
 * either the next argument or `--flag=value`.
 */
export function parseSubmitArgs(args: string[], cwd: string): SubmitArgs {
  const flags = new Set<string>();
  const lists: Record<"reviewer" | "blocker" | "upstream", string[]> = {
    reviewer: [],
    blocker: [],
    upstream: [],
  };
  let message: string | null = null;
  let bug: string | null = null;
  let path = cwd;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    const equals = arg.indexOf("=");
    const name = equals === -1 ? arg : arg.slice(0, equals);
    const booleanFlag = BOOLEAN_FLAGS[name];
    if (booleanFlag && equals === -1) {
      flags.add(booleanFlag);
      continue;
    }

    const valueFlag = VALUE_FLAGS[name];
    if (!valueFlag) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    let value: string;
    if (equals !== -1) {
      value = arg.slice(equals + 1);
    } else {
      const next: string | undefined = args[i + 1];
      if (next === undefined) {
        throw new UsageError(`Option ${name} needs a value`);
      }
      value = next;
      i++;
    }

    switch (valueFlag) {
      case "reviewer":
      case "blocker":
      case "upstream":
        lists[valueFlag].push(...splitList(value));
        break;
      case "message":
        message = value;
        break;
      case "path":
        path = value;
        break;
      case "bug":
        if (!/^\d+$/.test(value)) {
          throw new UsageError(`Bug ID must be a number: ${value}`);
        }
        bug = value;
        break;
    }
  }

  if (positional.length > 2) {
    throw new UsageError(`Too many revisions: ${positional.join(" ")}`);
  }
  if (flags.has("wip") && flags.has("noWip")) {
    throw new UsageError("--wip and --no-wip can't be used together");
  }
  if (bug !== null && flags.has("noBug")) {
    throw new UsageError("--bug and --no-bug can't be used together");
  }

  return {
    options: {
      start: positional[0] ?? null,
      end: positional[1] ?? null,
      single: flags.has("single"),
      upstreams: lists.upstream,
      lessContext: flags.has("lessContext"),
      force: flags.has("force"),
      wip: flags.has("wip") ? true : flags.has("noWip") ? false : null,
      reviewers: { reviewers: lists.reviewer, blockers: lists.blocker },
      comment: message,
      allowReorder: flags.has("allowReorder"),
      bug,
      noBug: flags.has("noBug"),
    },
    yes: flags.has("yes"),
    dryRun: flags.has("dryRun"),
    path,
  };
}

export function parseCommand(argv: string[], cwd: string): Command {
  const command: string | undefined = argv[0];
  const rest = argv.slice(1);
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };
    case "submit":
      if (rest.includes("--help") || rest.includes("-h")) {
        return { command: "help" };
      }
      return { command: "submit", ...parseSubmitArgs(rest, cwd) };
    case "auth": {
      const subcommand: string = rest.length ? rest[0] : "help";
      if (subcommand !== "test" && subcommand !== "help") {
        throw new UsageError(`Unknown auth command: ${subcommand}`);
      }
      return { command: "auth", subcommand };
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
