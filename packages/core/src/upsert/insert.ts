/**
 * Core Package - Input Insertion
 *
 * Adds a declaration for an input the manifest does not have yet, and
 * threads its name into `outputs`. All edits are computed against the
 * original text and applied together.
 */

import { comparePositions, type Expression, type KeyValueBinding, type Position } from "@flakepatch/syntax";
import { expectMap, findAll, findFirst, keySegments } from "../resolve/attr-path.js";
import { collectAllInputs, type DeclarationForm } from "../resolve/inputs.js";
import { debug } from "../shared/debug.js";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import { nullLogger, type Logger } from "../shared/logger.js";
import { applyEdits, insert, validateEdits, type TextEdit } from "../text/edit.js";
import {
  detectNewline,
  isIndentation,
  lineEndOffset,
  lineStartOffset,
  offsetAt,
} from "../text/position-index.js";
import { quoteString } from "./literal.js";
import { patchOutputsFunction } from "./outputs.js";
import type {
  AttrClassification,
  InputAnchor,
  InsertInputOptions,
  InsertionLocation,
} from "./types.js";

interface InsertContext {
  readonly source: string;
  readonly inputName: string;
  readonly inputValue: string;
  readonly newline: string;
  readonly logger: Logger;
}

/**
 * Insert `inputs.<inputName>.url = "<inputValue>";` and add the name to the
 * `outputs` parameters.
 *
 * @returns the patched manifest text
 * @throws FlakeEditError `FLAKE_MISSING_OUTPUTS` or
 * `FLAKE_MISSING_INPUTS_AND_OUTPUTS` when there is no `outputs` binding
 */
export function insertInput(options: InsertInputOptions): string {
  const { expression, source, inputName, inputValue } = options;
  const insertionLocation = options.insertionLocation ?? "top";
  const context: InsertContext = {
    source,
    inputName,
    inputValue,
    newline: detectNewline(source),
    logger: options.logger ?? nullLogger,
  };

  const plan = classify(expression, insertionLocation, context.logger);
  debug.insert("plan", { kinds: plan.map((attr) => attr.kind), insertionLocation });

  const edits: TextEdit[] = [];
  for (const attr of plan) {
    edits.push(...processAttr(attr, expression, context));
  }

  if (!validateEdits(edits)) {
    throw new FlakeEditError(
      `edits for input ${inputName} overlap`,
      FlakeEditErrorCode.EDIT_CONFLICT
    );
  }
  return applyEdits(source, edits);
}

/**
 * Classify the top level of the manifest into the edits it needs, later
 * edit location first.
 */
export function classify(
  expression: Expression,
  insertionLocation: InsertionLocation,
  logger: Logger = nullLogger
): AttrClassification[] {
  const anchor = findInputAnchor(expression, insertionLocation, logger);
  const outputs = findFirst(expression, ["outputs"]);

  if (anchor !== null && outputs !== null) {
    const inputs: AttrClassification = { kind: "inputs", anchor };
    const outputsAttr: AttrClassification = { kind: "outputs", binding: outputs };
    return comparePositions(anchorPosition(anchor), outputs.span.start) > 0
      ? [inputs, outputsAttr]
      : [outputsAttr, inputs];
  }
  if (anchor !== null) {
    return [{ kind: "inputs", anchor }, { kind: "missing-outputs", span: anchor.binding.span }];
  }
  if (outputs !== null) {
    return [{ kind: "missing-inputs", outputs }, { kind: "outputs", binding: outputs }];
  }
  return [{ kind: "missing-both", span: expression.span }];
}

/**
 * The binding a new declaration is placed next to.
 *
 * `top` anchors on the first `inputs` binding: inside `inputs = { … }` that
 * is the block's first child, otherwise the dotted `inputs.…` binding itself.
 * `bottom` anchors after the last declared input, and falls back to `top`
 * when no declaration is recognized.
 */
export function findInputAnchor(
  expression: Expression,
  insertionLocation: InsertionLocation,
  logger: Logger = nullLogger
): InputAnchor | null {
  if (insertionLocation === "bottom") {
    const collected = collectAllInputs(findAll(expression, ["inputs"]));
    const last = collected[collected.length - 1];
    if (last !== undefined) {
      return { kind: "after", binding: last.binding, form: last.form };
    }
    logger.warn("no existing input declarations found, inserting at the top of `inputs`");
  }

  const inputs = findFirst(expression, ["inputs"]);
  if (inputs === null) return null;

  if (keySegments(inputs).length > 1) {
    return { kind: "before", binding: inputs, form: "flattened" };
  }

  const block = expectMap(inputs.to);
  const first = findFirst(block, null);
  return first === null
    ? { kind: "empty-set", binding: inputs, map: block }
    : { kind: "before", binding: first, form: "nested" };
}

/* =============================================================================
 * EDITS
 * ============================================================================= */

function processAttr(attr: AttrClassification, root: Expression, context: InsertContext): TextEdit[] {
  switch (attr.kind) {
    case "inputs":
      return [insertNextToAnchor(attr.anchor, context)];

    case "outputs":
      return patchOutputs(attr.binding, context);

    case "missing-inputs":
      return [insertAboveOutputs(attr.outputs, context)];

    case "missing-outputs":
      throw FlakeEditError.at(
        "the flake has no `outputs` attribute",
        FlakeEditErrorCode.MISSING_OUTPUTS,
        attr.span.start
      );

    case "missing-both":
      throw FlakeEditError.at(
        "the flake has neither `inputs` nor `outputs` attributes",
        FlakeEditErrorCode.MISSING_INPUTS_AND_OUTPUTS,
        root.span.start
      );
  }
}

function insertNextToAnchor(anchor: InputAnchor, context: InsertContext): TextEdit {
  const { source, newline } = context;

  switch (anchor.kind) {
    case "before": {
      const declaration = declare(anchor.form, context);
      const start = offsetAt(source, anchor.binding.span.start);
      const indentation = source.slice(lineStartOffset(source, start), start);
      debug.insert("before", { line: anchor.binding.span.start.line, form: anchor.form });
      return isIndentation(indentation)
        ? insert(start, `${declaration}${newline}${indentation}`)
        : insert(start, `${declaration} `);
    }

    case "after": {
      const declaration = declare(anchor.form, context);
      const start = offsetAt(source, anchor.binding.span.start);
      const end = offsetAt(source, anchor.binding.span.end);
      const indentation = source.slice(lineStartOffset(source, start), start);
      const lineEnd = lineEndOffset(source, end);
      const rest = source.slice(end, lineEnd);
      debug.insert("after", { line: anchor.binding.span.end.line, form: anchor.form });

      if (!isIndentation(indentation) || !/^[ \t]*(?:#.*)?\r?$/.test(rest)) {
        return insert(end, ` ${declaration}`);
      }
      if (lineEnd === source.length) {
        return insert(lineEnd, `${newline}${indentation}${declaration}`);
      }
      return insert(lineEnd + 1, `${indentation}${declaration}${newline}`);
    }

    case "empty-set": {
      const declaration = declare("nested", context);
      const open = source.indexOf("{", offsetAt(source, anchor.map.span.start));
      const following = source.charAt(open + 1);
      debug.insert("empty-set", { line: anchor.map.span.start.line });
      return insert(open + 1, /\s/.test(following) ? ` ${declaration}` : ` ${declaration} `);
    }
  }
}

function insertAboveOutputs(outputs: KeyValueBinding, context: InsertContext): TextEdit {
  const { source, newline } = context;
  const declaration = declare("flattened", context);
  const start = offsetAt(source, outputs.span.start);
  const indentation = source.slice(lineStartOffset(source, start), start);
  debug.insert("missing-inputs", { line: outputs.span.start.line });
  return isIndentation(indentation)
    ? insert(start, `${declaration}${newline}${newline}${indentation}`)
    : insert(start, `${declaration} `);
}

function patchOutputs(outputs: KeyValueBinding, context: InsertContext): TextEdit[] {
  const value = outputs.to;
  if (value.$kind !== "Function") {
    throw FlakeEditError.at(
      `unsupported \`outputs\` expression type ${value.$kind}`,
      FlakeEditErrorCode.UNSUPPORTED_EXPRESSION_KIND,
      value.span.start
    );
  }
  return patchOutputsFunction(context.source, value, context.inputName, context.logger);
}

function declare(form: DeclarationForm, context: InsertContext): string {
  const key = form === "nested" ? context.inputName : `inputs.${context.inputName}`;
  return `${key}.url = ${quoteString(context.inputValue)};`;
}

function anchorPosition(anchor: InputAnchor): Position {
  return anchor.kind === "after" ? anchor.binding.span.end : anchor.binding.span.start;
}
