import { groupTableRows } from "./internal/table/grouping";
import { columnWidths, formatTableRow } from "./internal/table/layout";
import { assertTextRow, normalizeTableRows } from "./internal/table/rows";
import type { TableRows } from "./types";
import { compareOrdinal, textWidth } from "./utils";

export interface FmtTableOptions {
  /** Column whose value buckets the rows. It is left out of the output. */
  group_by?: number;
  row_indent?: number;
  /** Pad for data cells. Headers are always padded with spaces. */
  pad_char?: string;
  divider_char?: string;
}

/**
 * Format rows as a plain-text table.
 *
 * A mapping is rendered as two-column `key value` rows sorted by key. The
 * number of columns printed for a row is the smaller of the header count
 * and that row's own length.
 */
export function fmt_table(
  rows: TableRows,
  headers: readonly string[],
  options: FmtTableOptions | number = {}
): string {
  const resolved = resolveFmtTableOptions(options);
  const grouped = groupTableRows(
    normalizeTableRows(rows),
    assertTextRow(headers, "Headers"),
    resolved.group_by
  );

  const widths = columnWidths(grouped.headers, grouped.rows);
  const groupKeys = [...grouped.groups.keys()].sort(compareOrdinal);
  const groupWidth = Math.max(0, ...groupKeys.map(textWidth));

  let output = formatTableRow(widths, grouped.headers, {
    pad: " ",
    indent: 0,
    minWidth: 0,
  });
  output += formatTableRow(
    widths,
    grouped.headers.map(() => ""),
    { pad: resolved.divider_char, indent: 0, minWidth: groupWidth + 1 }
  );

  for (const group of groupKeys) {
    if (group) {
      output += `\n${group}\n`;
    }
    for (const row of grouped.groups.get(group) ?? []) {
      output += formatTableRow(widths, row, {
        pad: resolved.pad_char,
        indent: resolved.row_indent,
        minWidth: 0,
      });
    }
  }

  return output;
}

interface ResolvedFmtTableOptions {
  group_by: number | undefined;
  row_indent: number;
  pad_char: string;
  divider_char: string;
}

function resolveFmtTableOptions(options: FmtTableOptions | number): ResolvedFmtTableOptions {
  const source = typeof options === "number" ? { group_by: options } : options;
  const resolved: ResolvedFmtTableOptions = {
    group_by: source.group_by,
    row_indent: source.row_indent ?? 1,
    pad_char: source.pad_char ?? " ",
    divider_char: source.divider_char ?? "-",
  };

  if (!Number.isInteger(resolved.row_indent) || resolved.row_indent < 0) {
    throw new RangeError("row_indent must be a non-negative integer.");
  }
  for (const name of ["pad_char", "divider_char"] as const) {
    if (textWidth(resolved[name]) !== 1) {
      throw new RangeError(`${name} must be exactly one character.`);
    }
  }
  return resolved;
}
