import { listInputs, nullLogger, type InputSummary, type Logger } from "@flakepatch/core";
import { loadFlake } from "../load.js";
import { DEFAULT_ADD_OPTIONS } from "../options.js";

export interface InputsCommandOptions {
  flakePath?: string;
  logger?: Logger;
}

/** Print `name<TAB>url` for each declared input; `-` for a non-literal URL. */
export async function runInputs(options: InputsCommandOptions = {}): Promise<InputSummary[]> {
  const logger = options.logger ?? nullLogger;
  const { parsed } = await loadFlake(options.flakePath ?? DEFAULT_ADD_OPTIONS.flakePath);

  const inputs = listInputs(parsed.expression);
  for (const input of inputs) {
    logger.log(`${input.name}\t${input.url ?? "-"}`);
  }
  return inputs;
}
