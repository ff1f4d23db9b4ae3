import type { TextEdit } from "@valuekit/core";

/**
 * Apply non-overlapping edits to `text`. Edits are applied from the end of
 * the text backwards so earlier offsets stay valid; insertions at the same
 * offset keep their given order.
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  const ordered = edits
    .map((edit, index) => ({ edit, index }))
    .sort((a, b) => b.edit.start - a.edit.start || b.index - a.index);

  let result = text;
  for (const { edit } of ordered) {
    if (edit.start < 0 || edit.end > result.length || edit.start > edit.end) {
      throw new RangeError(`Edit [${edit.start}, ${edit.end}) is outside the text`);
    }
    result = result.slice(0, edit.start) + edit.newText + result.slice(edit.end);
  }
  return result;
}
