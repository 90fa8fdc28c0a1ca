import type { SolutionSummary } from "../pcst/cursor.js";
import type { SolverResult } from "../pcst/solver/types.js";
import type { ResultRow } from "../pcst/translator.js";

const ROW_HEADER = ["seq", "edge", "source", "target", "cost"] as const;

function renderTable(
  header: ReadonlyArray<string>,
  body: ReadonlyArray<ReadonlyArray<string>>,
): string {
  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map((cells) => cells[column].length)),
  );
  const line = (cells: ReadonlyArray<string>): string =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join("  ").trimEnd();
  return [line(header), ...body.map(line)].join("\n");
}

export function formatRowsTable(rows: ReadonlyArray<ResultRow>): string {
  const body = rows.map((row) => [
    String(row.seq),
    row.edge,
    row.source,
    row.target,
    String(row.cost),
  ]);
  const table = renderTable(ROW_HEADER, body);
  return `${table}\n(${rows.length} ${rows.length === 1 ? "row" : "rows"})`;
}

export function formatRowsJson(
  rows: ReadonlyArray<ResultRow>,
  summary: SolutionSummary | undefined,
): string {
  return JSON.stringify(
    {
      rows,
      nodes: summary?.nodes ?? [],
      totalPrize: summary?.totalPrize ?? 0,
      totalCost: summary?.totalCost ?? 0,
    },
    null,
    2,
  );
}

export function formatDenseTable(result: SolverResult): string {
  return [
    `nodes: ${result.nodes.join(", ")}`,
    `edges: ${result.edges.join(", ")}`,
  ].join("\n");
}

export function formatDenseJson(result: SolverResult): string {
  return JSON.stringify({ nodes: result.nodes, edges: result.edges }, null, 2);
}
