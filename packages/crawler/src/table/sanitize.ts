/**
 * Repairs tables where a logical row is split into a label-only row followed
 * by a values-only row.
 *
 * Empty rows are dropped. A single-cell row whose cell passes `isLabel` takes
 * the cells of the following row; any other single-cell row is dropped.
 * Applying it to its own output changes nothing.
 */
export function sanitizeRows(rows: string[][], isLabel: (cell: string) => boolean): string[][] {
  const nonEmpty = rows.filter((row) => row.length > 0);
  const result: string[][] = [];

  for (let i = 0; i < nonEmpty.length; i++) {
    const row = nonEmpty[i];
    if (row.length > 1) {
      result.push(row);
      continue;
    }

    const next = nonEmpty[i + 1];
    const nextIsValues = next !== undefined && !(next.length === 1 && isLabel(next[0]));
    if (isLabel(row[0]) && nextIsValues) {
      result.push([row[0], ...next]);
      i++;
    }
  }

  return result;
}
