import {
  VERBOSE_REGISTRY_LOG_LIMIT,
  VERBOSE_RESULT_LOG_LIMIT,
} from "../config/constants.js";
import type { LoggerLike } from "../util/logger.js";
import type { AssembledGraph } from "./assembler.js";
import type { ExternalId } from "./ids.js";
import { invokeSolver } from "./invoke.js";
import { resolveRoot, rootToIndex, type RootInput } from "./root.js";
import type { PruningStrategy } from "./pruning.js";
import type { EdgePair, PcstSolver, SolverInput } from "./solver/types.js";
import { ResultTranslator, type ResultRow } from "./translator.js";

export type CursorStateKind =
  | "uninitialized"
  | "streaming"
  | "exhausted"
  | "failed";

/**
 * Everything the first pull needs besides the rows themselves.
 */
export interface SolveSettings {
  root: RootInput;
  targetClusters: number;
  pruning: PruningStrategy;
  verbosity: number;
  solver: PcstSolver;
  logger: LoggerLike;
}

export interface SolutionSummary {
  nodes: ReadonlyArray<ExternalId>;
  edgeCount: number;
  totalPrize: number;
  totalCost: number;
}

/**
 * Produces the assembled graph, or throws. Called at most once per cursor.
 */
export type GraphLoader = () => AssembledGraph;

/**
 * Resolves settings lazily so that option errors surface on the first
 * pull like every other failure.
 */
export type SettingsResolver = () => SolveSettings;

interface SolvedState {
  translator: ResultTranslator;
  selectedEdges: ReadonlyArray<number>;
  position: number;
}

type CursorState =
  | { kind: "uninitialized" }
  | { kind: "streaming"; solved: SolvedState }
  | { kind: "exhausted" }
  | { kind: "failed"; error: unknown };

/**
 * PcstCursor
 *
 * Pull-based iterator over one solve. The first `next()` assembles the
 * graph, resolves the root and calls the solver; later calls only
 * translate one selected edge each. Failures surface once, on that first
 * pull, and the cursor then reports done forever.
 *
 * State machine:
 *   uninitialized --solve ok--> streaming --n pulls--> exhausted
 *   uninitialized --any error--> failed
 */
export class PcstCursor implements IterableIterator<ResultRow> {
  private current: CursorState = { kind: "uninitialized" };
  private summaryValue: SolutionSummary | undefined;
  private released = false;

  constructor(
    private readonly load: GraphLoader,
    private readonly settings: SettingsResolver,
    private readonly onRelease?: () => void,
  ) {}

  get state(): CursorStateKind {
    return this.current.kind;
  }

  /** Number of rows this cursor yields, once solved. */
  get total(): number | undefined {
    return this.summaryValue?.edgeCount;
  }

  /** Selected nodes and totals, once solved. */
  get summary(): SolutionSummary | undefined {
    return this.summaryValue;
  }

  /** External ids of the selected nodes, ascending by dense index. */
  get selectedNodes(): ReadonlyArray<ExternalId> | undefined {
    return this.summaryValue?.nodes;
  }

  get error(): unknown {
    return this.current.kind === "failed" ? this.current.error : undefined;
  }

  next(): IteratorResult<ResultRow> {
    switch (this.current.kind) {
      case "uninitialized": {
        let solved: SolvedState;
        try {
          solved = this.solve();
        } catch (error) {
          this.current = { kind: "failed", error };
          this.release();
          throw error;
        }
        this.current = { kind: "streaming", solved };
        return this.pull(solved);
      }
      case "streaming":
        return this.pull(this.current.solved);
      case "exhausted":
      case "failed":
        return { done: true, value: undefined };
    }
  }

  /** Stops early; resources are released as on exhaustion. */
  return(): IteratorResult<ResultRow> {
    if (this.current.kind === "uninitialized" || this.current.kind === "streaming") {
      this.current = { kind: "exhausted" };
      this.release();
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): PcstCursor {
    return this;
  }

  private pull(solved: SolvedState): IteratorResult<ResultRow> {
    if (solved.position >= solved.selectedEdges.length) {
      this.current = { kind: "exhausted" };
      this.release();
      return { done: true, value: undefined };
    }
    const edgeIndex = solved.selectedEdges[solved.position];
    solved.position += 1;
    return {
      done: false,
      value: solved.translator.translate(edgeIndex, solved.position),
    };
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease?.();
  }

  private solve(): SolvedState {
    const settings = this.settings();
    const { verbosity, logger: log } = settings;

    const graph = this.load();
    if (verbosity >= 1) {
      log.info("Assembled PCST input", { ...graph.stats });
    }
    if (verbosity >= 2) {
      const entries = graph.registry.entries();
      const shown = entries.slice(0, VERBOSE_REGISTRY_LOG_LIMIT);
      shown.forEach((id, index) => log.debug("Registry entry", { index, id }));
      if (entries.length > shown.length) {
        log.debug("Registry entries truncated", {
          shown: shown.length,
          total: entries.length,
        });
      }
    }

    const root = resolveRoot(graph.registry, settings.root);
    const input: SolverInput = {
      edges: graph.edges.map((edge): EdgePair => [edge.source, edge.target]),
      costs: graph.costs,
      prizes: graph.prizes,
      root: rootToIndex(root),
      targetClusters: settings.targetClusters,
      pruning: settings.pruning,
      verbosity,
    };

    if (verbosity >= 1) {
      log.info("Invoking PCST solver", {
        solver: settings.solver.name,
        nodes: input.prizes.length,
        edges: input.edges.length,
        root: input.root,
        targetClusters: input.targetClusters,
        pruning: input.pruning,
      });
    }

    const result = invokeSolver(settings.solver, input);
    const translator = new ResultTranslator(graph.registry, graph.edges);

    let totalPrize = 0;
    for (const node of result.nodes) totalPrize += graph.prizes[node];
    let totalCost = 0;
    for (const edge of result.edges) totalCost += graph.costs[edge];

    this.summaryValue = {
      nodes: result.nodes.map((node) => translator.translateNode(node)),
      edgeCount: result.edges.length,
      totalPrize,
      totalCost,
    };

    if (verbosity >= 1) {
      log.info("PCST solve complete", {
        selectedNodes: result.nodes.length,
        selectedEdges: result.edges.length,
        totalPrize,
        totalCost,
      });
    }
    if (verbosity >= 3) {
      for (const edge of result.edges.slice(0, VERBOSE_RESULT_LOG_LIMIT)) {
        log.debug("Selected edge", { index: edge, id: graph.edges[edge].edgeId });
      }
    }

    return { translator, selectedEdges: result.edges, position: 0 };
  }
}
