#!/usr/bin/env node
import meow from "meow";
import chalk from "chalk";
import { refreshDebugChannels } from "@flakepatch/core";
import { runAdd } from "./commands/add.js";
import { runInputs } from "./commands/inputs.js";
import { CliError, CliErrorCode, describeError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { resolveDebugFromEnv } from "./options.js";

const cli = meow(
  `
Usage
  $ flakepatch <command> [options]

Commands
  add <input-ref>     Add an input to the manifest, or update its URL
  inputs              List the inputs the manifest declares

Options
  --flake-path            Manifest to edit (default: ./flake.nix)
  --input-name            Name for the input (inferred from the reference when possible)
  --insertion-location    Where a new input goes: top or bottom (default: top)
  --dry-run               Print the patched manifest instead of writing it
  --debug                 Debug channels to enable, e.g. insert,outputs or *

Examples
  $ flakepatch add github:NixOS/nixpkgs/nixos-unstable
  $ flakepatch add https://example.com/flake.tar.gz --input-name=example
  $ flakepatch add github:nix-community/home-manager --insertion-location=bottom --dry-run
  $ flakepatch inputs --flake-path=./nix/flake.nix
`,
  {
    importMeta: import.meta,
    flags: {
      flakePath: { type: "string" },
      inputName: { type: "string" },
      insertionLocation: { type: "string" },
      dryRun: { type: "boolean", default: false },
      debug: { type: "string" },
    },
  }
);

async function main(): Promise<void> {
  const [command, ...rest] = cli.input;
  const flags = cli.flags;
  const logger = createConsoleLogger();

  const channels = resolveDebugFromEnv(flags.debug);
  if (channels !== undefined) {
    refreshDebugChannels(channels);
  }

  switch (command) {
    case "add": {
      const [inputRef] = rest;
      if (inputRef === undefined) {
        throw new CliError("`add` needs an input reference, e.g. github:NixOS/nixpkgs", CliErrorCode.MISSING_ARGUMENT);
      }
      await runAdd(inputRef, {
        flakePath: flags.flakePath,
        inputName: flags.inputName,
        insertionLocation: flags.insertionLocation,
        dryRun: flags.dryRun,
        logger,
      });
      return;
    }
    case "inputs":
      await runInputs({ flakePath: flags.flakePath, logger });
      return;
    case undefined:
      cli.showHelp(0);
      return;
    default:
      throw new CliError(`unknown command \`${command}\``, CliErrorCode.UNKNOWN_COMMAND);
  }
}

main().catch((error: unknown) => {
  const message = describeError(error);
  if (message === null) throw error;
  process.stderr.write(`${chalk.red(message)}\n`);
  process.exitCode = 1;
});
