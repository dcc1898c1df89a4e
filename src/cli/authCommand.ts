import { getAuthDetails, getConduitAuth } from "../lib/auth.js";
import { createConduitServer } from "../lib/conduit.js";
import { loadArcConfig } from "../lib/config.js";
import { detectRepository } from "../lib/vcs.js";
import { StackError } from "../lib/errors.js";

/**
 * Command to test Conduit authentication
 */
export async function authTestCommand(path: string): Promise<void> {
  console.log("🔐 Testing Conduit authentication...\n");

  const repository = await detectRepository(path);
  const arcConfig = await loadArcConfig(repository.root);
  const auth = await getConduitAuth(arcConfig.url);
  if (auth.kind === "failure") {
    throw new StackError(
      `No Conduit API token found for ${arcConfig.url}. Run \`phab-stack auth help\`.`,
    );
  }
  const source =
    auth.config.source === "env-var" ? "CONDUIT_API_TOKEN" : "~/.arcrc";
  console.log(`✅ Using token from: ${source}`);

  const server = createConduitServer({
    url: arcConfig.url,
    token: auth.config.token,
    callsign: arcConfig.callsign,
    vcs: repository.kind,
    sourcePath: repository.root,
  });
  const details = await getAuthDetails(server);
  if (details.kind === "failure") {
    throw new StackError(`The token was rejected by ${arcConfig.url}`);
  }
  const { userName, realName } = details.user;
  console.log(
    `👤 Authenticated as: ${userName} (${realName || "No name set"})`,
  );
}

/**
 * Show authentication help
 */
export function authHelpCommand(): void {
  console.log("🔐 Conduit Authentication Help");
  console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
  console.log("phab-stack looks for an API token in this order:");
  console.log("");
  console.log("1. 🌍 The CONDUIT_API_TOKEN environment variable");
  console.log("2. 📄 The server's entry in ~/.arcrc (written by `arc install-certificate`)");
  console.log("");
  console.log("Create a token under Settings → Conduit API Tokens on your Phabricator server.");
  console.log("The server URL comes from `phabricator.uri` in the repository's .arcconfig.");
}
