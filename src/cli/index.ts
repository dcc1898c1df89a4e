#!/usr/bin/env node

import { parseCommand } from "./args.js";
import { helpText } from "./help.js";
import { submitCommand } from "./submitCommand.js";
import { authHelpCommand, authTestCommand } from "./authCommand.js";
import { StackError } from "../lib/errors.js";

function showHelp() {
  console.log(helpText());
}

async function main(argv: string[]): Promise<void> {
  const command = parseCommand(argv, process.cwd());
  switch (command.command) {
    case "help":
      showHelp();
      return;
    case "auth":
      if (command.subcommand === "test") {
        await authTestCommand(process.cwd());
      } else {
        authHelpCommand();
      }
      return;
    case "submit":
      await submitCommand(command);
      return;
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof StackError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
