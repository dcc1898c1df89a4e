import { execFile } from "child_process";
import { CommandError } from "./errors.js";
import { logger } from "./logger.js";

export interface RunOptions {
  cwd: string;
  input?: string;
  env?: Record<string, string>;
}

// AIDEV-NOTE: Full-context diffs of large files can exceed the default 1MB buffer
const MAX_BUFFER = 256 * 1024 * 1024;

function commandError(
  binary: string,
  args: string[],
  error: Error & { code?: unknown },
  stderr: string,
): CommandError {
  const status = typeof error.code === "number" ? error.code : null;
  const detail = stderr.trim() || error.message;
  return new CommandError(
    `\`${binary} ${args.join(" ")}\` failed: ${detail}`,
    status,
    stderr,
  );
}

/**
 * Run a command and resolve with its stdout as text
 */
export function runCommand(
  binary: string,
  args: string[],
  options: RunOptions,
): Promise<string> {
  return new Promise((resolve, reject) => {
    logger.debug(`$ ${binary} ${args.join(" ")}`);
    const child = execFile(
      binary,
      args,
      {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        if (error) {
          logger.error(`Command failed: ${binary} ${args.join(" ")}`);
          return reject(commandError(binary, args, error, stderr));
        }
        if (stderr) {
          logger.debug(`stderr: ${stderr}`);
        }
        resolve(stdout);
      },
    );
    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}

/**
 * Run a command and resolve with its raw stdout, for blob contents
 */
export function runCommandBuffer(
  binary: string,
  args: string[],
  options: RunOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    logger.debug(`$ ${binary} ${args.join(" ")}`);
    execFile(
      binary,
      args,
      {
        cwd: options.cwd,
        maxBuffer: MAX_BUFFER,
        encoding: "buffer",
      },
      (error, stdout, stderr) => {
        if (error) {
          return reject(
            commandError(binary, args, error, stderr.toString("utf8")),
          );
        }
        resolve(stdout);
      },
    );
  });
}
