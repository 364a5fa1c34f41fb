export interface GroupedRows {
  headers: string[];
  rows: string[][];
  groups: Map<string, string[][]>;
}

export const UNGROUPED = "";

export function groupTableRows(
  rows: string[][],
  headers: string[],
  groupBy?: number
): GroupedRows {
  if (groupBy === undefined) {
    return { headers, rows, groups: new Map([[UNGROUPED, rows]]) };
  }

  if (!Number.isInteger(groupBy) || groupBy < 0 || groupBy >= headers.length) {
    throw new RangeError(
      `group_by must be an integer in [0, ${headers.length}), received ${groupBy}.`
    );
  }

  const keptHeaders = headers.filter((_, position) => position !== groupBy);
  const keptRows: string[][] = [];
  const groups = new Map<string, string[][]>();

  for (const [rowPosition, row] of rows.entries()) {
    const group = row[groupBy];
    if (group === undefined) {
      throw new RangeError(
        `Row ${rowPosition} has no cell at group_by index ${groupBy}.`
      );
    }

    const kept = row.filter((_, position) => position !== groupBy);
    keptRows.push(kept);
    const bucket = groups.get(group);
    if (bucket) {
      bucket.push(kept);
    } else {
      groups.set(group, [kept]);
    }
  }

  return { headers: keptHeaders, rows: keptRows, groups };
}
