import type { SolutionSummary } from "./cursor.js";
import type { EdgePair, SolverResult } from "./solver/types.js";
import type { ResultRow } from "./translator.js";

export interface DenseReportInput {
  edges: ReadonlyArray<EdgePair>;
  prizes: ArrayLike<number>;
  costs: ArrayLike<number>;
}

function listOrNone(values: ReadonlyArray<string | number>): string {
  return values.length > 0 ? values.join(", ") : "none";
}

/**
 * Text report of a dense solve: the input, which edges were picked, a
 * consistency check of picked edges against picked nodes, and totals.
 */
export function renderDenseReport(
  input: DenseReportInput,
  result: SolverResult,
): string {
  const lines: string[] = [];
  const selectedNodes = new Set(result.nodes);
  const selectedEdges = new Set(result.edges);

  lines.push("Input Edges:");
  input.edges.forEach(([u, v], i) => {
    lines.push(`  Edge ${i}: [${u},${v}] cost=${input.costs[i]}`);
  });

  lines.push("Input Node Prizes:");
  for (let i = 0; i < input.prizes.length; i++) {
    lines.push(`  Node ${i}: prize=${input.prizes[i]}`);
  }

  lines.push(`Selected Nodes: ${listOrNone(result.nodes)}`);
  lines.push(`Selected Edges: ${listOrNone(result.edges)}`);

  lines.push("Edge Analysis:");
  input.edges.forEach(([u, v], i) => {
    const marker = selectedEdges.has(i) ? "[SELECTED]" : "[unselected]";
    lines.push(`  Edge ${i}: [${u},${v}] cost=${input.costs[i]} ${marker}`);
    if (selectedEdges.has(i)) {
      for (const node of [u, v]) {
        if (!selectedNodes.has(node)) {
          lines.push(`  WARNING: edge ${i} is selected but node ${node} is not`);
        }
      }
    }
  });

  let totalPrize = 0;
  for (const node of result.nodes) totalPrize += input.prizes[node];
  let totalCost = 0;
  for (const edge of result.edges) totalCost += input.costs[edge];

  lines.push("Summary:");
  lines.push(`  Total prize: ${totalPrize}`);
  lines.push(`  Total cost: ${totalCost}`);
  lines.push(`  Net benefit: ${totalPrize - totalCost}`);
  lines.push(`  Selected nodes: ${result.nodes.length} of ${input.prizes.length}`);
  lines.push(`  Selected edges: ${result.edges.length} of ${input.edges.length}`);

  lines.push("Connections:");
  if (result.edges.length === 0) {
    lines.push("  No edges selected");
  }
  for (const edge of result.edges) {
    const [u, v] = input.edges[edge];
    lines.push(`  [${u}]---[${v}] (via edge ${edge})`);
  }

  return lines.join("\n");
}

/**
 * Same summary for translated rows. Prize totals need the cursor's
 * solution summary, since rows carry only edge costs.
 */
export function renderRowReport(
  rows: ReadonlyArray<ResultRow>,
  summary?: SolutionSummary,
): string {
  const lines: string[] = ["Selected Edges:"];
  if (rows.length === 0) {
    lines.push("  No edges selected");
  }
  let totalCost = 0;
  for (const row of rows) {
    lines.push(
      `  #${row.seq} ${row.edge}: [${row.source}]---[${row.target}] cost=${row.cost}`,
    );
    totalCost += row.cost;
  }

  lines.push("Summary:");
  lines.push(`  Selected edges: ${rows.length}`);
  lines.push(`  Total cost: ${totalCost}`);
  if (summary) {
    lines.push(`  Selected nodes: ${listOrNone(summary.nodes)}`);
    lines.push(`  Total prize: ${summary.totalPrize}`);
    lines.push(`  Net benefit: ${summary.totalPrize - totalCost}`);
  }

  return lines.join("\n");
}
