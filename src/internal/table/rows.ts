import type { MappingKey, MappingValue, TableMapping, TableRow, TableRows } from "../../types";
import { compareMappingKeys } from "../../utils";

export function normalizeTableRows(rows: TableRows): string[][] {
  if (isRowSequence(rows)) {
    return rows.map((row, position) => assertTextRow(row, `Row ${position}`));
  }
  return mappingToRows(rows);
}

export function assertTextRow(row: TableRow, label: string): string[] {
  if (!Array.isArray(row)) {
    throw new TypeError(`${label} is not an array of strings.`);
  }
  const cells: string[] = [];
  for (const [position, cell] of row.entries()) {
    if (typeof cell !== "string") {
      throw new TypeError(`${label} cell ${position} is not a string.`);
    }
    cells.push(cell);
  }
  return cells;
}

function isRowSequence(rows: TableRows): rows is readonly TableRow[] {
  return Array.isArray(rows);
}

function mappingToRows(mapping: TableMapping): string[][] {
  const entries: [MappingKey, MappingValue][] = isKeyedMap(mapping)
    ? [...mapping.entries()]
    : Object.entries(mapping);

  for (const [key] of entries) {
    if (typeof key === "number" && Number.isNaN(key)) {
      throw new TypeError("Mapping key NaN cannot be ordered.");
    }
  }

  entries.sort(([left], [right]) => compareMappingKeys(left, right));
  return entries.map(([key, value]) => [String(key), String(value)]);
}

function isKeyedMap(
  mapping: TableMapping
): mapping is ReadonlyMap<MappingKey, MappingValue> {
  return mapping instanceof Map;
}
