import { writeFile } from "node:fs/promises";
import { debug, nullLogger, upsertInput, type Logger } from "@flakepatch/core";
import { inferInputNameAndUrl, type FlakeRefResolver } from "../flake-ref.js";
import { loadFlake } from "../load.js";
import { normalizeAddOptions, type AddOptions } from "../options.js";

export interface AddCommandOptions extends AddOptions {
  /** Registry lookup for `org/project` references */
  resolver?: FlakeRefResolver;
  logger?: Logger;
}

export interface AddResult {
  flakePath: string;
  inputName: string;
  url: string;
  contents: string;
  /** False for a dry run */
  written: boolean;
}

/**
 * Add or update an input in the manifest at `flakePath`. With `dryRun` the
 * patched manifest is printed instead of written.
 */
export async function runAdd(inputRef: string, options: AddCommandOptions = {}): Promise<AddResult> {
  const logger = options.logger ?? nullLogger;
  const resolved = normalizeAddOptions(options);

  const { source, parsed } = await loadFlake(resolved.flakePath);
  const { name, url } = await inferInputNameAndUrl(inputRef, resolved.inputName, options.resolver);
  debug.cli("add", { flakePath: resolved.flakePath, name, url });

  const contents = upsertInput({
    expression: parsed.expression,
    source,
    inputName: name,
    inputValue: url,
    attrPath: ["inputs", name, "url"],
    insertionLocation: resolved.insertionLocation,
    logger,
  });

  if (resolved.dryRun) {
    logger.log(contents);
    return { flakePath: resolved.flakePath, inputName: name, url, contents, written: false };
  }

  await writeFile(resolved.flakePath, contents, "utf8");
  logger.info(`Added input ${name} = ${url} to ${resolved.flakePath}`);
  return { flakePath: resolved.flakePath, inputName: name, url, contents, written: true };
}
