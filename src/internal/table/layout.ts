import { ljust, textWidth } from "../../utils";

export interface RowStyle {
  pad: string;
  indent: number;
  minWidth: number;
}

const SEPARATOR = " ";

export function columnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((header, position) => {
    let width = textWidth(header);
    for (const row of rows) {
      const cell = row[position];
      if (cell !== undefined) {
        width = Math.max(width, textWidth(cell));
      }
    }
    return width;
  });
}

/**
 * Render one line. Only `min(widths.length, row.length)` cells are emitted,
 * so short rows are truncated rather than padded. When the line is narrower
 * than `minWidth`, its trailing separator is traded for pad characters until
 * it is exactly `minWidth` wide.
 */
export function formatTableRow(
  widths: number[],
  row: string[],
  style: RowStyle
): string {
  const indent = " ".repeat(style.indent);
  const count = Math.min(widths.length, row.length);

  let line = "";
  for (let position = 0; position < count; position += 1) {
    line += indent + ljust(row[position] ?? "", widths[position] ?? 0, style.pad) + SEPARATOR;
  }

  const width = textWidth(line);
  if (width < style.minWidth) {
    if (count > 0) {
      line = line.slice(0, -SEPARATOR.length);
    }
    line += style.pad.repeat(style.minWidth - textWidth(line));
  }

  return `${line}\n`;
}
