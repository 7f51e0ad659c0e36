import { readFile } from "node:fs/promises";
import { parse, type Parsed } from "@flakepatch/syntax";
import { debug } from "@flakepatch/core";

/** Written in place of a missing, blank or empty manifest. */
export const FALLBACK_FLAKE_CONTENTS = `{
  description = "My new flake.";

  outputs = { ... } @ inputs: { };
}
`;

export interface LoadedFlake {
  readonly source: string;
  readonly parsed: Parsed;
  /** Whether `source` is the fallback manifest rather than the file's text */
  readonly fallback: boolean;
}

export async function loadFlake(flakePath: string): Promise<LoadedFlake> {
  let source: string;
  try {
    source = await readFile(flakePath, "utf8");
  } catch (error) {
    if (!isNotFound(error)) throw error;
    debug.cli("load.missing", { flakePath });
    return loadFallback();
  }

  if (source.trim() === "") {
    return loadFallback();
  }

  const parsed = parse(source);
  if (parsed.expression.$kind === "Map" && parsed.expression.bindings.length === 0) {
    return loadFallback();
  }
  return { source, parsed, fallback: false };
}

function loadFallback(): LoadedFlake {
  return { source: FALLBACK_FLAKE_CONTENTS, parsed: parse(FALLBACK_FLAKE_CONTENTS), fallback: true };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
