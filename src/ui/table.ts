export type CellStyle = "name" | "count" | "path" | "muted";

export interface TableColumn {
  header: string;
  align?: "left" | "right";
  style?: CellStyle;
}

export type TableRow =
  | { kind: "data"; cells: string[] }
  | { kind: "group"; label: string }
  | { kind: "separator" };

export interface TableData {
  title: string;
  columns: TableColumn[];
  rows: TableRow[];
}

/** Colouring hooks; widths are always measured on the unpainted text. */
export interface Painter {
  title(text: string): string;
  header(text: string): string;
  group(text: string): string;
  border(text: string): string;
  cell(style: CellStyle | undefined, text: string): string;
}

export const plainPainter: Painter = {
  title: (text) => text,
  header: (text) => text,
  group: (text) => text,
  border: (text) => text,
  cell: (_style, text) => text,
};

export function formatTable(table: TableData, paint: Painter = plainPainter): string[] {
  const widths = table.columns.map((c) => c.header.length);

  for (const row of table.rows) {
    if (row.kind === "data") {
      row.cells.forEach((cell, i) => {
        if (i < widths.length) widths[i] = Math.max(widths[i], cell.length);
      });
    } else if (row.kind === "group" && widths.length > 0) {
      widths[0] = Math.max(widths[0], row.label.length);
    }
  }

  const rule = paint.border(`+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`);
  const bar = paint.border("|");
  const renderCells = (cells: string[]): string =>
    `${bar} ${cells.join(` ${bar} `)} ${bar}`;

  const lines = [paint.title(table.title), rule];
  lines.push(
    renderCells(table.columns.map((c, i) => paint.header(c.header.padEnd(widths[i])))),
  );
  lines.push(rule);

  for (const row of table.rows) {
    if (row.kind === "data") {
      lines.push(
        renderCells(
          table.columns.map((column, i) => {
            const text = row.cells[i] ?? "";
            const padded =
              column.align === "right" ? text.padStart(widths[i]) : text.padEnd(widths[i]);
            return paint.cell(column.style, padded);
          }),
        ),
      );
    } else if (row.kind === "group") {
      lines.push(
        renderCells(
          widths.map((w, i) => (i === 0 ? paint.group(row.label.padEnd(w)) : " ".repeat(w))),
        ),
      );
    } else {
      lines.push(renderCells(widths.map((w) => " ".repeat(w))));
    }
  }

  lines.push(rule);
  return lines;
}
