import { createInterface } from "readline/promises";
import type { ParentRef, PlanOperation } from "../lib/stackTypes.js";
import type {
  SubmissionCallbacks,
  SubmissionPlan,
  SubmitContext,
} from "../lib/submit.js";
import type { SubmitArgs } from "./args.js";
import {
  analyzeSubmission,
  executeSubmissionPlan,
  isPlanEmpty,
} from "../lib/submit.js";
import { createConduitServer } from "../lib/conduit.js";
import { getConduitAuth } from "../lib/auth.js";
import { loadArcConfig, loadConfig } from "../lib/config.js";
import { createVcsFunctions, detectRepository } from "../lib/vcs.js";
import {
  createFileIdentityStore,
  identityCachePath,
} from "../lib/identityCache.js";
import { StackError } from "../lib/errors.js";

function shortId(localId: string): string {
  return localId.slice(0, 12);
}

export function describeParent(
  parent: ParentRef,
  plan: SubmissionPlan,
): string {
  switch (parent.type) {
    case "root":
      return "no parent";
    case "identity":
      return `D${parent.identity}`;
    case "output": {
      const operation = plan.reconciliation.operations[parent.operationIndex];
      return `the new revision of #${operation.ordinal + 1}`;
    }
  }
}

/**
 * One line describing what an operation will do
 */
export function describeOperation(
  operation: PlanOperation,
  plan: SubmissionPlan,
): string {
  const descriptor = plan.descriptors[operation.ordinal];
  const label = `#${operation.ordinal + 1} ${shortId(descriptor.localId)}`;
  const parent = describeParent(operation.parent, plan);
  switch (operation.type) {
    case "create": {
      const replaces =
        operation.replaces === null
          ? ""
          : ` (replaces D${operation.replaces})`;
      return `➕ ${label}: create "${operation.content.title}"${replaces}, parent: ${parent}`;
    }
    case "update":
      return `🔄 ${label}: update D${operation.identity} (${operation.reason}), parent: ${parent}`;
    case "reparent":
      return `🔗 ${label}: set parent of D${operation.identity} to ${parent}`;
  }
}

function printPlan(plan: SubmissionPlan): void {
  console.log(`\n📚 Stack of ${plan.descriptors.length} commits:`);
  for (const descriptor of plan.descriptors) {
    const identity =
      descriptor.identity === null ? "(new)" : `D${descriptor.identity}`;
    console.log(
      `   ${shortId(descriptor.localId)} ${identity} ${descriptor.title}`,
    );
  }

  if (plan.reconciliation.operations.length) {
    console.log(`\n📋 ${plan.reconciliation.operations.length} operations:`);
    for (const operation of plan.reconciliation.operations) {
      console.log(`   ${describeOperation(operation, plan)}`);
    }
  }
  if (plan.amendments.length) {
    console.log(
      `\n✏️  ${plan.amendments.length} commit messages will be updated`,
    );
  }
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} (y/N) `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Build the collaborators of a submission from the repository at `path`
 */
export async function createSubmitContext(
  path: string,
): Promise<SubmitContext> {
  const repository = await detectRepository(path);
  const config = await loadConfig();
  const arcConfig = await loadArcConfig(repository.root);

  const auth = await getConduitAuth(arcConfig.url);
  if (auth.kind === "failure") {
    throw new StackError(
      `No Conduit API token found for ${arcConfig.url}. Set CONDUIT_API_TOKEN, or run \`arc install-certificate\`. ` +
        "See `phab-stack auth help`.",
    );
  }

  const vcs = createVcsFunctions(repository, {
    git: { binaryPath: config.git.binaryPath, remotes: config.git.remote },
    jj: { binaryPath: config.jj.binaryPath },
  });
  return {
    vcs,
    server: createConduitServer({
      url: arcConfig.url,
      token: auth.config.token,
      callsign: arcConfig.callsign,
      vcs: vcs.name,
      sourcePath: repository.root,
    }),
    store: createFileIdentityStore(identityCachePath(await vcs.stateDir())),
    config,
  };
}

const callbacks: SubmissionCallbacks = {
  onAnalyzingStack: () => console.log("🔍 Reading local stack..."),
  onFetchingRevisions: (identities) =>
    console.log(
      `🌐 Fetching ${identities.map((id) => `D${id}`).join(", ")}...`,
    ),
  onWarning: (message) => console.log(`⚠️  ${message}`),
  onOperationStarted: (operation) => {
    switch (operation.type) {
      case "create":
        console.log(
          `📝 Creating revision for "${operation.content.title}"...`,
        );
        break;
      case "update":
        console.log(`📝 Updating D${operation.identity}...`);
        break;
      case "reparent":
        console.log(`🔗 Updating parent of D${operation.identity}...`);
        break;
    }
  },
  onOperationCompleted: (operation, _index, identity) => {
    if (operation.type === "create") console.log(`✅ Created D${identity}`);
  },
  onAmendCompleted: (amendment) =>
    console.log(
      `✏️  Added D${amendment.identity} to ${shortId(amendment.localId)}`,
    ),
};

/**
 * Main submit command function
 */
export async function submitCommand(args: SubmitArgs): Promise<void> {
  const context = await createSubmitContext(args.path);
  const plan = await analyzeSubmission(context, args.options, callbacks);
  printPlan(plan);

  if (isPlanEmpty(plan)) {
    console.log("\n✅ No changes to submit.");
    return;
  }
  if (args.dryRun) {
    console.log("\n🧪 Dry run, nothing was submitted.");
    return;
  }
  if (!args.yes && !context.config.submit.autoSubmit) {
    if (!(await confirm("\nSubmit?"))) {
      console.log("Aborted.");
      return;
    }
  }

  const result = await executeSubmissionPlan(
    context,
    plan,
    args.options,
    callbacks,
  );
  if (result.revisions.length) {
    console.log("");
    for (const revision of result.revisions) {
      console.log(`${revision.created ? "🆕" : "✅"} ${revision.url}`);
    }
  }

  if (!result.success) {
    for (const { error, context: where } of result.errors.slice(1)) {
      console.error(`❌ Also failed during ${where}: ${error.message}`);
    }
    console.log("💡 Rerun the command to continue from where it stopped.");
    throw result.errors[0].error;
  }
  console.log(
    `\n🎉 Successfully submitted ${result.revisions.length} revisions!`,
  );
}
