import stripAnsi from 'strip-ansi';

/** Text that may carry ANSI style sequences, e.g. the output of chalk. */
export type StyledText = string;

export type TableRow = readonly StyledText[];

export type Table = readonly TableRow[];

/** Column index to the widest visual length seen at that index. */
export type ColumnWidthMap = Map<number, number>;

export function stripStyle(text: StyledText): string {
  return stripAnsi(text);
}

/**
 * Number of characters a terminal shows for `text`, style sequences excluded.
 */
export function visualLength(text: StyledText): number {
  return stripStyle(text).length;
}

export function measureColumns(table: Table): ColumnWidthMap {
  const widths: ColumnWidthMap = new Map();
  for (const row of table) {
    row.forEach((cell, index) => {
      const length = visualLength(cell);
      const current = widths.get(index);
      if (current === undefined || current < length) {
        widths.set(index, length);
      }
    });
  }
  return widths;
}

/**
 * Render rows of styled cells as left-aligned columns separated by at least
 * `paddingSize` spaces. The last cell of a row is never padded, so no line
 * ends in whitespace. Rows may have different cell counts.
 */
export function listAsPaddedTable(table: Table, paddingSize = 1): string {
  if (!Number.isInteger(paddingSize) || paddingSize < 0) {
    throw new RangeError(`paddingSize must be a non-negative integer, got ${paddingSize}`);
  }

  const widths = measureColumns(table);
  const lines = table.map((row) =>
    row
      .map((cell, index) => {
        if (index === row.length - 1) return cell;
        const columnWidth = (widths.get(index) ?? 0) + paddingSize;
        const padding = Math.max(columnWidth - visualLength(cell), paddingSize);
        return cell + ' '.repeat(padding);
      })
      .join(''),
  );

  return lines.join('\n');
}
