/**
 * Plain-text table formatting for list output.
 */

export interface Column<T> {
  header: string;
  width: number;
  value: (row: T) => string;
}

/** Fixed-width table; the last column is not padded */
export function formatTable<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  const render = (cells: string[]): string =>
    cells
      .map((cell, index) => (index === cells.length - 1 ? cell : cell.padEnd(columns[index]?.width ?? 0)))
      .join("")
      .trimEnd();

  const totalWidth = columns.reduce((sum, column) => sum + column.width, 0);
  const lines = [
    render(columns.map((column) => column.header)),
    "-".repeat(totalWidth),
    ...rows.map((row) => render(columns.map((column) => column.value(row)))),
  ];
  return lines.join("\n");
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
