import { MalformedInputError } from "./errors.js";
import { IdentifierRegistry } from "./registry.js";
import {
  isIdentifierValue,
  toExternalId,
  type ExternalId,
  type IdentifierValue,
} from "./ids.js";

/**
 * One column of an input row, as handed over by the query collaborator.
 */
export type CellValue = IdentifierValue | null | undefined;

export interface EdgeRecord {
  edgeId: ExternalId;
  source: number;
  target: number;
  cost: number;
}

export interface AssemblyStats {
  edgeRows: number;
  nodes: number;
  prizeRowsApplied: number;
  prizeRowsUnknown: number;
  prizeRowsNull: number;
}

export interface AssembledGraph {
  registry: IdentifierRegistry;
  edges: ReadonlyArray<EdgeRecord>;
  costs: Float64Array;
  prizes: Float64Array;
  stats: AssemblyStats;
}

type AssemblyPhase = "edges" | "prizes" | "built";

function requireIdentifier(
  value: CellValue,
  field: string,
  rowLabel: string,
): ExternalId {
  if (value === null || value === undefined) {
    throw new MalformedInputError(`${rowLabel}: ${field} is null`);
  }
  if (!isIdentifierValue(value)) {
    throw new MalformedInputError(
      `${rowLabel}: ${field} has unsupported type ${typeof value}`,
    );
  }
  return toExternalId(value);
}

/**
 * Reads a numeric column. Numeric text and bigints are accepted since
 * drivers disagree on how they surface DECIMAL and BIGINT columns.
 */
export function toFiniteNumber(value: IdentifierValue): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function requireNonNegative(
  value: CellValue,
  field: string,
  rowLabel: string,
): number {
  if (value === null || value === undefined) {
    throw new MalformedInputError(`${rowLabel}: ${field} is null`);
  }
  const parsed = toFiniteNumber(value);
  if (parsed === undefined || parsed < 0) {
    throw new MalformedInputError(
      `${rowLabel}: ${field} must be a finite number >= 0, got ${String(value)}`,
    );
  }
  return parsed;
}

/**
 * GraphAssembler
 *
 * Builds the solver's dense arrays from edge rows and prize rows. Edge
 * rows come first and are the only source of nodes; `sealEdges()` then
 * freezes the registry and allocates the prize table, and prize rows are
 * overlaid onto it. Any malformed row aborts the whole assembly.
 */
export class GraphAssembler {
  private readonly registry = new IdentifierRegistry();
  private readonly edges: EdgeRecord[] = [];
  private prizes: Float64Array = new Float64Array(0);
  private phase: AssemblyPhase = "edges";
  private prizeRows = 0;
  private prizeRowsApplied = 0;
  private prizeRowsUnknown = 0;
  private prizeRowsNull = 0;

  consumeEdgeRow(
    edgeId: CellValue,
    source: CellValue,
    target: CellValue,
    cost: CellValue,
  ): void {
    this.assertPhase("edges", "consumeEdgeRow");
    const rowLabel = `edge row ${this.edges.length + 1}`;

    // Validate every column before interning, so a bad row leaves no trace.
    const id = requireIdentifier(edgeId, "edge id", rowLabel);
    const sourceId = requireIdentifier(source, "source", rowLabel);
    const targetId = requireIdentifier(target, "target", rowLabel);
    const edgeCost = requireNonNegative(cost, "cost", rowLabel);

    this.edges.push({
      edgeId: id,
      source: this.registry.intern(sourceId),
      target: this.registry.intern(targetId),
      cost: edgeCost,
    });
  }

  sealEdges(): void {
    this.assertPhase("edges", "sealEdges");
    if (this.edges.length === 0) {
      throw new MalformedInputError("The edges query returned no rows");
    }
    this.registry.seal();
    this.prizes = new Float64Array(this.registry.size);
    this.phase = "prizes";
  }

  consumePrizeRow(nodeId: CellValue, prize: CellValue): void {
    this.assertPhase("prizes", "consumePrizeRow");
    this.prizeRows += 1;
    const rowLabel = `prize row ${this.prizeRows}`;

    const id = requireIdentifier(nodeId, "node id", rowLabel);
    if (prize === null || prize === undefined) {
      this.prizeRowsNull += 1;
      return;
    }
    const value = requireNonNegative(prize, "prize", rowLabel);

    const index = this.registry.lookup(id);
    if (index === undefined) {
      this.prizeRowsUnknown += 1;
      return;
    }
    this.prizes[index] = value;
    this.prizeRowsApplied += 1;
  }

  build(): AssembledGraph {
    this.assertPhase("prizes", "build");
    this.phase = "built";
    return {
      registry: this.registry,
      edges: this.edges,
      costs: Float64Array.from(this.edges, (edge) => edge.cost),
      prizes: this.prizes,
      stats: {
        edgeRows: this.edges.length,
        nodes: this.registry.size,
        prizeRowsApplied: this.prizeRowsApplied,
        prizeRowsUnknown: this.prizeRowsUnknown,
        prizeRowsNull: this.prizeRowsNull,
      },
    };
  }

  private assertPhase(expected: AssemblyPhase, operation: string): void {
    if (this.phase !== expected) {
      throw new Error(
        `${operation} called during the ${this.phase} phase (expected ${expected})`,
      );
    }
  }
}
