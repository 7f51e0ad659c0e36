/**
 * Core Package - Source Editing
 *
 * Text edits over string offsets. Every change to a manifest is expressed
 * as one of these; nothing is ever re-serialized from the tree.
 */

/* =============================================================================
 * TYPES
 * ============================================================================= */

/**
 * An offset range in source text.
 */
export interface OffsetSpan {
  /** Start offset in characters */
  start: number;

  /** End offset in characters (exclusive) */
  end: number;
}

export interface Replacement {
  type: "replace";
  span: OffsetSpan;
  newText: string;
}

export interface Insertion {
  type: "insert";
  position: number;
  text: string;
}

export type TextEdit = Replacement | Insertion;

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

export function replace(span: OffsetSpan, newText: string): TextEdit {
  return { type: "replace", span, newText };
}

export function insert(position: number, text: string): TextEdit {
  return { type: "insert", position, text };
}

/**
 * Apply edits computed against the same original text.
 *
 * They are spliced from the end of the text towards the start, so each one
 * only shifts text that no remaining edit refers to. Edits that share a
 * start are spliced in reverse list order, which leaves their text in list
 * order.
 */
export function applyEdits(source: string, edits: readonly TextEdit[]): string {
  const ordered = edits
    .map((edit, index) => ({ range: editRange(edit), text: editText(edit), index }))
    .sort((a, b) => b.range.start - a.range.start || b.index - a.index);

  return ordered.reduce(
    (result, { range, text }) => result.slice(0, range.start) + text + result.slice(range.end),
    source
  );
}

/**
 * Whether no two edits touch the same characters. An insertion on the
 * boundary of another edit does not count as touching it.
 */
export function validateEdits(edits: readonly TextEdit[]): boolean {
  const ranges = edits.map(editRange).sort((a, b) => a.start - b.start || a.end - b.end);
  return ranges.every((range, i) => {
    const next = ranges[i + 1];
    return next === undefined || range.end <= next.start;
  });
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/** The original characters an edit covers; empty for an insertion. */
function editRange(edit: TextEdit): OffsetSpan {
  return edit.type === "replace" ? edit.span : { start: edit.position, end: edit.position };
}

function editText(edit: TextEdit): string {
  return edit.type === "replace" ? edit.newText : edit.text;
}
