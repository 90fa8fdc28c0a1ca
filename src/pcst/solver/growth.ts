import type { SolverInput } from "./types.js";

export interface ForestEdge {
  edge: number;
  /**
   * Nodes of the cluster on the far side of this edge when that cluster
   * had already gone inactive at merge time, or null. Pruning may drop
   * these nodes again.
   */
  inactiveNodes: number[] | null;
}

export interface GrowthResult {
  /** Edges in the order growth added them. */
  forest: ForestEdge[];
  /** Nodes of the clusters that survive growth, ascending. */
  goodNodes: number[];
  events: number;
}

export type GrowthEvent =
  | { type: "merge"; time: number; edge: number; activeClusters: number }
  | { type: "deactivate"; time: number; cluster: number; activeClusters: number };

interface Cluster {
  nodes: number[];
  active: boolean;
  potential: number;
  containsRoot: boolean;
  live: boolean;
}

/**
 * Moat growth. Every active cluster grows at rate 1 and spends its
 * remaining prize as it grows; an edge goes tight once the moats on its two
 * sides cover its cost, merging the clusters. Ties go to the lowest edge
 * index, then to the lowest cluster index.
 *
 * Unrooted growth stops once at most `targetClusters` clusters are
 * active. Rooted growth keeps the root cluster inactive and stops once no
 * cluster is active.
 */
export function growForest(
  input: SolverInput,
  onEvent?: (event: GrowthEvent) => void,
): GrowthResult {
  const { edges, costs, prizes, root, targetClusters } = input;
  const nodeCount = prizes.length;

  const clusters: Cluster[] = [];
  const clusterOf = new Int32Array(nodeCount);
  let activeCount = 0;

  for (let node = 0; node < nodeCount; node++) {
    const isRoot = node === root;
    const active = !isRoot && prizes[node] > 0;
    clusters.push({
      nodes: [node],
      active,
      potential: isRoot ? 0 : prizes[node],
      containsRoot: isRoot,
      live: true,
    });
    clusterOf[node] = node;
    if (active) activeCount++;
  }

  const slack = Float64Array.from(costs);
  const forest: ForestEdge[] = [];
  let now = 0;
  let events = 0;

  const finished = (): boolean =>
    root !== null ? activeCount === 0 : activeCount <= targetClusters;

  const edgeRate = (edge: number): number => {
    const [u, v] = edges[edge];
    const a = clusterOf[u];
    const b = clusterOf[v];
    if (a === b) return 0;
    return (clusters[a].active ? 1 : 0) + (clusters[b].active ? 1 : 0);
  };

  while (!finished()) {
    let bestTime = Infinity;
    let bestEdge = -1;
    let bestCluster = -1;

    for (let edge = 0; edge < edges.length; edge++) {
      const rate = edgeRate(edge);
      if (rate === 0) continue;
      const time = Math.max(0, slack[edge]) / rate;
      if (time < bestTime) {
        bestTime = time;
        bestEdge = edge;
      }
    }

    for (let id = 0; id < clusters.length; id++) {
      const cluster = clusters[id];
      if (!cluster.live || !cluster.active) continue;
      const time = Math.max(0, cluster.potential);
      if (time < bestTime) {
        bestTime = time;
        bestEdge = -1;
        bestCluster = id;
      }
    }

    if (bestTime === Infinity) break;

    for (let edge = 0; edge < edges.length; edge++) {
      const rate = edgeRate(edge);
      if (rate > 0) slack[edge] -= bestTime * rate;
    }
    for (const cluster of clusters) {
      if (cluster.live && cluster.active) cluster.potential -= bestTime;
    }
    now += bestTime;
    events++;

    if (bestEdge >= 0) {
      const [u, v] = edges[bestEdge];
      const a = clusters[clusterOf[u]];
      const b = clusters[clusterOf[v]];

      let inactiveNodes: number[] | null = null;
      if (!a.active && !a.containsRoot) inactiveNodes = [...a.nodes];
      else if (!b.active && !b.containsRoot) inactiveNodes = [...b.nodes];

      const containsRoot = a.containsRoot || b.containsRoot;
      const merged: Cluster = {
        nodes: a.nodes.concat(b.nodes),
        active: !containsRoot,
        potential: containsRoot
          ? 0
          : Math.max(0, a.potential) + Math.max(0, b.potential),
        containsRoot,
        live: true,
      };

      activeCount -= (a.active ? 1 : 0) + (b.active ? 1 : 0);
      if (merged.active) activeCount++;
      a.live = b.live = false;
      a.active = b.active = false;

      const mergedId = clusters.length;
      clusters.push(merged);
      for (const node of merged.nodes) clusterOf[node] = mergedId;

      forest.push({ edge: bestEdge, inactiveNodes });
      onEvent?.({
        type: "merge",
        time: now,
        edge: bestEdge,
        activeClusters: activeCount,
      });
    } else {
      const cluster = clusters[bestCluster];
      cluster.active = false;
      cluster.potential = 0;
      activeCount--;
      onEvent?.({
        type: "deactivate",
        time: now,
        cluster: bestCluster,
        activeClusters: activeCount,
      });
    }
  }

  const goodNodes: number[] = [];
  if (root !== null) {
    goodNodes.push(...clusters[clusterOf[root]].nodes);
  } else {
    for (const cluster of clusters) {
      if (cluster.live && cluster.active) goodNodes.push(...cluster.nodes);
    }
  }
  goodNodes.sort((x, y) => x - y);

  return { forest, goodNodes, events };
}
