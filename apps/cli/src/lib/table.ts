import { theme } from "./theme.ts";

const ANSI = /\x1b\[[0-9;]*m/g;

/** Printed width of a cell, ignoring color codes. */
export function visibleWidth(value: string): number {
  return value.replace(ANSI, "").length;
}

export interface Column<T> {
  header: string;
  cell: (item: T) => string;
  /** Numbers read better right-aligned. */
  align?: "left" | "right";
}

export interface TableOptions {
  /** Left indent in spaces (default: 2) */
  indent?: number;
  /** Spaces between columns (default: 2) */
  gap?: number;
}

function pad(value: string, width: number, align: "left" | "right"): string {
  const fill = " ".repeat(Math.max(0, width - visibleWidth(value)));
  return align === "right" ? fill + value : value + fill;
}

/** Lay out `items` as lines, header first. Trailing spaces are trimmed. */
export function formatTable<T>(
  columns: Column<T>[],
  items: T[],
  options: TableOptions = {},
): string[] {
  const indent = " ".repeat(options.indent ?? 2);
  const gap = " ".repeat(options.gap ?? 2);
  const cells = items.map((item) => columns.map((column) => column.cell(item)));
  const widths = columns.map((column, index) =>
    Math.max(
      column.header.length,
      ...cells.map((row) => visibleWidth(row[index] ?? "")),
    ),
  );

  const line = (row: string[], style: (s: string) => string = (s) => s) =>
    (
      indent +
      row
        .map((value, index) => {
          const column = columns[index];
          const width = widths[index] ?? 0;
          return style(pad(value, width, column?.align ?? "left"));
        })
        .join(gap)
    ).trimEnd();

  return [
    line(
      columns.map((column) => column.header),
      theme.muted,
    ),
    ...cells.map((row) => line(row)),
  ];
}

export function renderTable<T>(
  columns: Column<T>[],
  items: T[],
  options?: TableOptions,
): void {
  for (const line of formatTable(columns, items, options)) {
    console.log(line);
  }
}
