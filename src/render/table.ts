export interface Column {
  header: string;
  align?: "left" | "right";
}

const GAP = "  ";

/**
 * Plain-text table: optional title, header row, dashed rule, then rows.
 * Column widths fit the widest cell; trailing spaces are trimmed.
 */
export function renderTable(columns: readonly Column[], rows: readonly string[][], title?: string): string {
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...rows.map((row) => (row[i] ?? "").length)),
  );

  const line = (cells: readonly string[]) =>
    columns
      .map((col, i) => {
        const cell = cells[i] ?? "";
        return col.align === "right" ? cell.padStart(widths[i]) : cell.padEnd(widths[i]);
      })
      .join(GAP)
      .trimEnd();

  const out: string[] = [];
  if (title) out.push(title);
  out.push(line(columns.map((c) => c.header)));
  out.push(widths.map((w) => "-".repeat(w)).join(GAP));
  for (const row of rows) out.push(line(row));
  return out.join("\n");
}
