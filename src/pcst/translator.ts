import type { EdgeRecord } from "./assembler.js";
import type { ExternalId } from "./ids.js";
import type { IdentifierRegistry } from "./registry.js";

/**
 * One output row: a selected edge in external identifiers, with the cost
 * from its input row.
 */
export interface ResultRow {
  seq: number;
  edge: ExternalId;
  source: ExternalId;
  target: ExternalId;
  cost: number;
}

export class ResultTranslator {
  constructor(
    private readonly registry: Pick<IdentifierRegistry, "resolve">,
    private readonly edges: ReadonlyArray<EdgeRecord>,
  ) {}

  translate(edgeIndex: number, seq: number): ResultRow {
    const record = this.edges[edgeIndex];
    if (record === undefined) {
      throw new RangeError(
        `Edge index ${edgeIndex} is outside the edge list (size ${this.edges.length})`,
      );
    }
    return {
      seq,
      edge: record.edgeId,
      source: this.registry.resolve(record.source),
      target: this.registry.resolve(record.target),
      cost: record.cost,
    };
  }

  translateNode(nodeIndex: number): ExternalId {
    return this.registry.resolve(nodeIndex);
  }
}
