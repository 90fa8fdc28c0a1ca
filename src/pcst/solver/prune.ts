import type { ForestEdge, GrowthResult } from "./growth.js";
import type { SolverInput } from "./types.js";

export interface PrunedForest {
  nodes: number[];
  edges: number[];
}

interface Neighbor {
  node: number;
  edge: number;
  cost: number;
}

function ascending(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

export function pruneForest(
  input: SolverInput,
  growth: GrowthResult,
): PrunedForest {
  switch (input.pruning) {
    case "none":
      return unpruned(input, growth);
    case "simple": {
      return {
        nodes: [...growth.goodNodes],
        edges: goodForest(input, growth).map((entry) => entry.edge),
      };
    }
    case "gw":
      return gwPrune(input, goodForest(input, growth), growth.goodNodes);
    case "strong":
      return strongPrune(input, goodForest(input, growth), growth.goodNodes);
  }
}

function unpruned(input: SolverInput, growth: GrowthResult): PrunedForest {
  const nodes = new Set(growth.goodNodes);
  for (const { edge } of growth.forest) {
    const [u, v] = input.edges[edge];
    nodes.add(u);
    nodes.add(v);
  }
  return {
    nodes: ascending(nodes),
    edges: growth.forest.map((entry) => entry.edge),
  };
}

/** Forest edges whose endpoints both survived growth. */
function goodForest(input: SolverInput, growth: GrowthResult): ForestEdge[] {
  const good = new Set(growth.goodNodes);
  return growth.forest.filter(({ edge }) => {
    const [u, v] = input.edges[edge];
    return good.has(u) && good.has(v);
  });
}

/**
 * Reverse delete: walks merges from last to first and drops a cluster that
 * was already inactive when it was merged, unless a later kept edge still
 * needs one of its nodes.
 */
function gwPrune(
  input: SolverInput,
  forest: ForestEdge[],
  goodNodes: number[],
): PrunedForest {
  const necessary = new Set<number>();
  const deleted = new Set<number>();
  const kept = new Array<boolean>(forest.length).fill(false);

  for (let i = forest.length - 1; i >= 0; i--) {
    const { edge, inactiveNodes } = forest[i];
    const [u, v] = input.edges[edge];
    if (deleted.has(u) || deleted.has(v)) continue;

    if (inactiveNodes && !inactiveNodes.some((node) => necessary.has(node))) {
      for (const node of inactiveNodes) deleted.add(node);
      continue;
    }

    kept[i] = true;
    necessary.add(u);
    necessary.add(v);
  }

  return {
    nodes: goodNodes.filter((node) => !deleted.has(node)),
    edges: forest.filter((_, i) => kept[i]).map((entry) => entry.edge),
  };
}

/**
 * Keeps, per tree, the subtree of maximum net weight (prizes minus edge
 * costs). Rooted trees keep their root; unrooted trees are re-rooted at the
 * best node, lowest index on ties.
 */
function strongPrune(
  input: SolverInput,
  forest: ForestEdge[],
  goodNodes: number[],
): PrunedForest {
  const adjacency = new Map<number, Neighbor[]>();
  for (const node of goodNodes) adjacency.set(node, []);
  for (const { edge } of forest) {
    const [u, v] = input.edges[edge];
    const cost = input.costs[edge];
    adjacency.get(u)?.push({ node: v, edge, cost });
    adjacency.get(v)?.push({ node: u, edge, cost });
  }

  const neighbors = (node: number): Neighbor[] => adjacency.get(node) ?? [];
  const seen = new Set<number>();
  const keptNodes = new Set<number>();
  const keptEdges = new Set<number>();

  for (const start of goodNodes) {
    if (seen.has(start)) continue;
    const component = walk(start, neighbors).order.map((step) => step.node);
    for (const node of component) seen.add(node);

    const root =
      input.root !== null && component.includes(input.root)
        ? input.root
        : bestRoot(start, input.prizes, neighbors);

    const tree = walk(root, neighbors);
    const value = subtreeValues(tree, input.prizes);
    keptNodes.add(root);
    for (const step of tree.order) {
      if (step.parent === -1) continue;
      if (!keptNodes.has(step.parent)) continue;
      if ((value.get(step.node) ?? 0) - step.cost > 0) {
        keptNodes.add(step.node);
        keptEdges.add(step.edge);
      }
    }
  }

  return {
    nodes: ascending(keptNodes),
    edges: forest
      .map((entry) => entry.edge)
      .filter((edge) => keptEdges.has(edge)),
  };
}

interface WalkStep {
  node: number;
  parent: number;
  edge: number;
  cost: number;
}

interface Walk {
  /** Breadth-first order; parents always precede children. */
  order: WalkStep[];
  children: Map<number, WalkStep[]>;
}

function walk(root: number, neighbors: (node: number) => Neighbor[]): Walk {
  const order: WalkStep[] = [{ node: root, parent: -1, edge: -1, cost: 0 }];
  const children = new Map<number, WalkStep[]>();
  const visited = new Set<number>([root]);

  for (let i = 0; i < order.length; i++) {
    const current = order[i].node;
    const list: WalkStep[] = [];
    for (const next of neighbors(current)) {
      if (visited.has(next.node)) continue;
      visited.add(next.node);
      const step = {
        node: next.node,
        parent: current,
        edge: next.edge,
        cost: next.cost,
      };
      order.push(step);
      list.push(step);
    }
    children.set(current, list);
  }
  return { order, children };
}

function subtreeValues(tree: Walk, prizes: Float64Array): Map<number, number> {
  const value = new Map<number, number>();
  for (let i = tree.order.length - 1; i >= 0; i--) {
    const { node } = tree.order[i];
    let total = prizes[node];
    for (const child of tree.children.get(node) ?? []) {
      total += Math.max(0, (value.get(child.node) ?? 0) - child.cost);
    }
    value.set(node, total);
  }
  return value;
}

function bestRoot(
  start: number,
  prizes: Float64Array,
  neighbors: (node: number) => Neighbor[],
): number {
  const tree = walk(start, neighbors);
  const down = subtreeValues(tree, prizes);
  const full = new Map<number, number>([[start, down.get(start) ?? 0]]);

  for (const step of tree.order) {
    if (step.parent === -1) continue;
    const own = down.get(step.node) ?? 0;
    const parentFull = full.get(step.parent) ?? 0;
    const upward = parentFull - Math.max(0, own - step.cost);
    full.set(step.node, own + Math.max(0, upward - step.cost));
  }

  let best = start;
  let bestValue = -Infinity;
  for (const node of ascending(full.keys())) {
    const candidate = full.get(node) ?? 0;
    if (candidate > bestValue) {
      best = node;
      bestValue = candidate;
    }
  }
  return best;
}
