// AIDEV-NOTE: Auth architecture:
// - lib/auth.ts: Pure functions that return structured results, no console output
// - CLI commands implement all user messaging directly
// - Library functions (like submit.ts) use lib/auth.ts directly for silent operation
// Tokens are never written anywhere; they come from the environment or arc's ~/.arcrc

import { homedir } from "os";
import type { ConduitUser, ReviewServer } from "./conduit.js";
import { loadArcrcToken } from "./config.js";
import { ConduitAPIError } from "./errors.js";
import { logger } from "./logger.js";

export interface AuthConfig {
  token: string;
  source: "env-var" | "arcrc";
}

// AIDEV-NOTE: Result types for clean separation of auth logic from presentation
export interface AuthSuccess {
  kind: "success";
  config: AuthConfig;
}

export interface AuthFailure {
  kind: "failure";
  reason: "no-auth-found" | "invalid-token";
}

/**
 * Get the Conduit API token using the following priority:
 * 1. CONDUIT_API_TOKEN environment variable
 * 2. The server's entry in ~/.arcrc
 */
export async function getConduitAuth(
  url: string,
  env: Record<string, string | undefined> = process.env,
  home = homedir(),
): Promise<AuthSuccess | AuthFailure> {
  const envToken = env.CONDUIT_API_TOKEN;
  if (envToken) {
    logger.debug("Found Conduit token in environment variable");
    return { kind: "success", config: { token: envToken, source: "env-var" } };
  }

  const arcrcToken = await loadArcrcToken(url, home);
  if (arcrcToken) {
    logger.debug("Found Conduit token in ~/.arcrc");
    return { kind: "success", config: { token: arcrcToken, source: "arcrc" } };
  }

  return { kind: "failure", reason: "no-auth-found" };
}

/**
 * Check the token against the server. Conduit and HTTP errors mean the token
 * was rejected; network failures propagate.
 */
export async function getAuthDetails(
  server: ReviewServer,
): Promise<{ kind: "success"; user: ConduitUser } | AuthFailure> {
  try {
    await server.ping();
    return { kind: "success", user: await server.whoami() };
  } catch (error) {
    if (error instanceof ConduitAPIError) {
      logger.debug(`Token rejected: ${error.message}`);
      return { kind: "failure", reason: "invalid-token" };
    }
    throw error;
  }
}
