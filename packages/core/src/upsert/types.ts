/**
 * Core Package - Upsert Types
 */

import type { Expression, KeyValueBinding, MapExpression, Span } from "@flakepatch/syntax";
import type { AttrPath } from "../resolve/attr-path.js";
import type { DeclarationForm } from "../resolve/inputs.js";
import type { Logger } from "../shared/logger.js";

/** Where a new input goes relative to the inputs already declared. */
export type InsertionLocation = "top" | "bottom";

export interface UpsertInputOptions {
  /** Root expression parsed from `source` */
  readonly expression: Expression;

  /** Manifest text; every edit is a span over it */
  readonly source: string;

  readonly inputName: string;

  /** URL to store. Escaped for the literal it lands in. */
  readonly inputValue: string;

  /**
   * Attribute path of the value to update.
   * @default ["inputs", inputName, "url"]
   */
  readonly attrPath?: AttrPath;

  /** @default "top" */
  readonly insertionLocation?: InsertionLocation;

  /** Receives warnings such as an input already listed in `outputs` */
  readonly logger?: Logger;
}

export type InsertInputOptions = Omit<UpsertInputOptions, "attrPath">;

/**
 * Where a new declaration is placed.
 *
 * - `before`: above the binding, in the binding's form
 * - `after`: below the binding, in the binding's form
 * - `empty-set`: inside `inputs = { };`, which has no binding to anchor on
 */
export type InputAnchor =
  | { readonly kind: "before"; readonly binding: KeyValueBinding; readonly form: DeclarationForm }
  | { readonly kind: "after"; readonly binding: KeyValueBinding; readonly form: DeclarationForm }
  | { readonly kind: "empty-set"; readonly binding: KeyValueBinding; readonly map: MapExpression };

/**
 * What the planner found at the top level of the manifest. A plan is one of
 * `[inputs, outputs]`, `[inputs, missing-outputs]`, `[missing-inputs, outputs]`
 * or `[missing-both]`, ordered so the later edit location comes first.
 */
export type AttrClassification =
  | { readonly kind: "inputs"; readonly anchor: InputAnchor }
  | { readonly kind: "outputs"; readonly binding: KeyValueBinding }
  | { readonly kind: "missing-inputs"; readonly outputs: KeyValueBinding }
  | { readonly kind: "missing-outputs"; readonly span: Span }
  | { readonly kind: "missing-both"; readonly span: Span };
