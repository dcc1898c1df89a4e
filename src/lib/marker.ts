import type { RemoteIdentity } from "./stackTypes.js";
import { MarkerError } from "./errors.js";

// AIDEV-NOTE: The marker line is the only durable link between a commit and its revision
const MARKER_LINE_RE =
  /^\s*Differential Revision:\s*https?:\/\/.+\/D(\d+)\s*$/;

/**
 * Every revision number referenced by a marker line, in message order
 */
export function findMarkers(message: string): RemoteIdentity[] {
  const identities: RemoteIdentity[] = [];
  for (const line of message.split("\n")) {
    const match = MARKER_LINE_RE.exec(line);
    if (match) {
      identities.push(Number(match[1]));
    }
  }
  return identities;
}

/**
 * Extract the revision a commit message is bound to, if any
 */
export function parseMarker(
  message: string,
  localId: string | null = null,
): RemoteIdentity | null {
  const identities = findMarkers(message);
  if (identities.length > 1) {
    throw new MarkerError(localId);
  }
  return identities.length === 1 ? identities[0] : null;
}

/**
 * Remove marker lines from a commit body, dropping trailing whitespace
 */
export function stripMarker(body: string): string {
  return body
    .split("\n")
    .filter((line) => !MARKER_LINE_RE.test(line))
    .join("\n")
    .trimEnd();
}

export function revisionUrl(
  serverUrl: string,
  identity: RemoteIdentity,
): string {
  return `${serverUrl.replace(/\/+$/, "")}/D${identity}`;
}

/**
 * Split a commit message into its first line and the rest
 */
export function splitMessage(message: string): { title: string; body: string } {
  const newline = message.indexOf("\n");
  if (newline === -1) {
    return { title: message.trim(), body: "" };
  }
  return {
    title: message.slice(0, newline).trim(),
    body: message.slice(newline + 1).replace(/^\s*\n/, "").trimEnd(),
  };
}

/**
 * Build the commit message carrying `url` as its only marker
 */
export function buildMessage(title: string, body: string, url: string): string {
  const summary = stripMarker(body);
  const prefix = summary ? `${summary}\n\n` : "";
  return `${title}\n\n${prefix}Differential Revision: ${url}`;
}

/**
 * Messages are compared without trailing whitespace, which VCSs normalise differently
 */
export function sameMessage(a: string, b: string): boolean {
  return a.trimEnd() === b.trimEnd();
}
