/**
 * Turns the reference given to `add` into an input name and URL.
 *
 * ```
 * github:NixOS/nixpkgs                 -> nixpkgs, github:NixOS/nixpkgs
 * https://example.com/x.tar.gz         -> needs --input-name
 * NixOS/nixpkgs, NixOS/nixpkgs/0.2411  -> asks a FlakeRefResolver
 * ```
 */

import { validRange } from "semver";
import { debug } from "@flakepatch/core";
import { CliError, CliErrorCode } from "./errors.js";

export interface InferredInput {
  readonly name: string;
  readonly url: string;
}

/**
 * Looks up `org/project[/version]` references in a flake registry.
 */
export interface FlakeRefResolver {
  resolve(org: string, project: string, version: string | null): Promise<InferredInput>;
}

const REGISTRY_REF = /^([^\s/:]+)\/([^\s/:]+)(?:\/([^\s/:]+))?$/;

export async function inferInputNameAndUrl(
  flakeRef: string,
  inputName: string | null,
  resolver?: FlakeRefResolver
): Promise<InferredInput> {
  const ref = flakeRef.replace(/\/+$/, "");
  const url = parseUrl(ref);

  if (url !== null && url.host === "") {
    // `github:owner/repo`: the first path segment is the owner
    const [, repository] = url.pathname.split("/");
    const name = inputName ?? (repository ? repository : null);
    if (name === null) {
      throw new CliError(
        `cannot infer an input name for ${ref}; please specify one with the \`--input-name\` flag`,
        CliErrorCode.INPUT_NAME_REQUIRED
      );
    }
    debug.cli("ref.scheme", { name, url: ref });
    return { name, url: ref };
  }

  if (url !== null) {
    if (inputName === null) {
      throw new CliError(
        `cannot infer an input name for \`${ref}\`; please specify one with the \`--input-name\` flag`,
        CliErrorCode.INPUT_NAME_REQUIRED
      );
    }
    return { name: inputName, url: ref };
  }

  const match = REGISTRY_REF.exec(ref);
  if (match === null) {
    throw new CliError(
      `\`${ref}\` is neither a URL nor of the form \`org/project\` or \`org/project/version\``,
      CliErrorCode.INVALID_FLAKE_REF
    );
  }

  const [, org = "", project = "", rawVersion] = match;
  const version = rawVersion === undefined ? null : rawVersion.replace(/\.tar\.gz$/, "").replace(/^v/, "");
  if (version !== null && validRange(version) === null) {
    throw new CliError(
      `version '${version}' was not a valid SemVer version requirement`,
      CliErrorCode.INVALID_VERSION
    );
  }

  if (resolver === undefined) {
    throw new CliError(
      `cannot resolve \`${ref}\` without a flake registry; pass a URL such as \`github:${org}/${project}\` instead`,
      CliErrorCode.FLAKE_REF_UNRESOLVABLE
    );
  }

  const resolved = await resolver.resolve(org, project, version);
  debug.cli("ref.resolved", { org, project, version, url: resolved.url });
  return {
    name: inputName ?? resolved.name,
    url: resolved.url.replace(/\.tar\.gz$/, ""),
  };
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}
