import stringWidth from "string-width";
import { DEFAULT_RENDER_OPTIONS } from "../domain/queries";
import type { CellValue, RenderOptions, ResultSet } from "../domain/types";

export function formatCell(value: CellValue): string {
  if (value === null) return "NULL";
  if (value instanceof Uint8Array) {
    return `x'${Buffer.from(value).toString("hex")}'`;
  }
  return String(value);
}

function isNumeric(value: CellValue): boolean {
  return typeof value === "number" || typeof value === "bigint";
}

function padEnd(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - stringWidth(text)));
}

function padStart(text: string, width: number): string {
  return " ".repeat(Math.max(0, width - stringWidth(text))) + text;
}

function center(text: string, width: number): string {
  const gap = Math.max(0, width - stringWidth(text));
  const left = Math.floor(gap / 2);
  return " ".repeat(left) + text + " ".repeat(gap - left);
}

/**
 * Renders a result set as text.
 *
 * Bordered tables upper-case the headers, right-align numbers and left-align
 * everything else. Widths are display columns, so wide (CJK) characters
 * count twice. With `mergeCells`, a value repeated from the row above is
 * blanked (and so is the separator segment above it).
 */
export function renderResultSet(
  result: ResultSet,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS
): string {
  const cells = result.rows.map(row =>
    result.columns.map((_, c) => formatCell(row[c] ?? null))
  );

  if (!options.renderAsTable) {
    const lines = [result.columns.join("\t"), ...cells.map(r => r.join("\t"))];
    return lines.join("\n") + "\n";
  }

  const headers = result.columns.map(c => c.toUpperCase());
  const merged = cells.map((row, r) =>
    row.map(
      (value, c) => options.mergeCells && r > 0 && cells[r - 1][c] === value
    )
  );
  const widths = headers.map((header, c) =>
    Math.max(stringWidth(header), ...cells.map(row => stringWidth(row[c])))
  );

  const border = "+" + widths.map(w => "-".repeat(w + 2)).join("+") + "+";
  const separator = (r: number) =>
    "+" +
    widths
      .map((w, c) => (merged[r][c] ? " " : "-").repeat(w + 2))
      .join("+") +
    "+";
  const line = (values: string[]) => "| " + values.join(" | ") + " |";

  const lines = [border, line(headers.map((h, c) => center(h, widths[c]))), border];
  cells.forEach((row, r) => {
    if (r > 0 && options.rowSeparatorLine) lines.push(separator(r));
    lines.push(
      line(
        row.map((value, c) => {
          const shown = merged[r][c] ? "" : value;
          return isNumeric(result.rows[r][c] ?? null)
            ? padStart(shown, widths[c])
            : padEnd(shown, widths[c]);
        })
      )
    );
  });
  if (cells.length > 0) lines.push(border);

  return lines.join("\n") + "\n";
}
