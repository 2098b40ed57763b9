/**
 * Reference lineup assignment using min-cost max-flow.
 *
 * Builds the bipartite graph source -> players -> slot instances -> sink
 * and finds the assignment that fills the most slots with the highest
 * total composite score. The greedy solver is what callers get; this is
 * the yardstick diagnostics measure it against.
 */

import { Player, Slot } from './lineup-optimizer.model';
import { canPositionFillSlot } from './slot-eligibility';

export interface OptimalSlotAssignment {
  slot: string;
  slotIndex: number;
  player: Player | null;
}

export interface OptimalAssignment {
  /** One entry per slot instance, in template order */
  assignments: OptimalSlotAssignment[];
  totalScore: number;
}

/**
 * Edge in the flow network
 */
interface Edge {
  to: number;
  rev: number; // Index of reverse edge in graph[to]
  cap: number;
  cost: number;
}

/** Integer costs keep SPFA exact */
const SCALE = 1_000_000;

/**
 * Min-cost max-flow using SPFA (Bellman-Ford variant) for shortest paths.
 * Handles the negative costs that scores become.
 */
class MinCostMaxFlow {
  private readonly graph: Edge[][];

  constructor(private readonly n: number) {
    this.graph = Array.from({ length: n }, () => []);
  }

  /**
   * Add an edge with given capacity and cost, plus its zero-capacity reverse edge.
   * Returns the forward edge so callers can read its residual capacity later.
   */
  addEdge(from: number, to: number, cap: number, cost: number): Edge {
    const forward: Edge = { to, cap, cost, rev: this.graph[to].length };
    this.graph[from].push(forward);
    this.graph[to].push({ to: from, cap: 0, cost: -cost, rev: this.graph[from].length - 1 });
    return forward;
  }

  run(source: number, sink: number, maxFlow: number): number {
    let totalFlow = 0;
    const INF = Number.MAX_SAFE_INTEGER;

    while (totalFlow < maxFlow) {
      const dist: number[] = new Array(this.n).fill(INF);
      const inQueue: boolean[] = new Array(this.n).fill(false);
      const parent: number[] = new Array(this.n).fill(-1);
      const parentEdge: number[] = new Array(this.n).fill(-1);

      dist[source] = 0;
      const queue: number[] = [source];
      inQueue[source] = true;

      for (let u = queue.shift(); u !== undefined; u = queue.shift()) {
        inQueue[u] = false;
        for (let i = 0; i < this.graph[u].length; i++) {
          const edge = this.graph[u][i];
          if (edge.cap > 0 && dist[u] + edge.cost < dist[edge.to]) {
            dist[edge.to] = dist[u] + edge.cost;
            parent[edge.to] = u;
            parentEdge[edge.to] = i;
            if (!inQueue[edge.to]) {
              queue.push(edge.to);
              inQueue[edge.to] = true;
            }
          }
        }
      }

      // No augmenting path found
      if (dist[sink] === INF) break;

      // Every edge out of the source has capacity 1, so each path carries one unit
      let v = sink;
      while (v !== source) {
        const u = parent[v];
        const edge = this.graph[u][parentEdge[v]];
        edge.cap -= 1;
        this.graph[v][edge.rev].cap += 1;
        v = u;
      }

      totalFlow += 1;
    }

    return totalFlow;
  }
}

/**
 * Best achievable assignment of players to slot instances: the most slots
 * filled, then the highest total composite. Unscored players count as zero.
 */
export function solveOptimalLineup(
  players: readonly Player[],
  slots: readonly Slot[]
): OptimalAssignment {
  const instances: Array<{ slot: Slot; index: number }> = [];
  for (const slot of slots) {
    for (let index = 0; index < slot.count; index++) instances.push({ slot, index });
  }

  const P = players.length;
  const S = instances.length;
  const source = 0;
  const sink = P + S + 1;
  const playerNode = (i: number) => i + 1;
  const slotNode = (j: number) => P + j + 1;

  const mcmf = new MinCostMaxFlow(sink + 1);
  const candidateEdges: Array<{ player: number; slot: number; edge: Edge }> = [];

  for (let i = 0; i < P; i++) {
    mcmf.addEdge(source, playerNode(i), 1, 0);
  }

  for (let i = 0; i < P; i++) {
    const cost = -Math.round((players[i].compositeScore ?? 0) * SCALE);
    for (let j = 0; j < S; j++) {
      if (canPositionFillSlot(players[i].position, instances[j].slot)) {
        const edge = mcmf.addEdge(playerNode(i), slotNode(j), 1, cost);
        candidateEdges.push({ player: i, slot: j, edge });
      }
    }
  }

  for (let j = 0; j < S; j++) {
    mcmf.addEdge(slotNode(j), sink, 1, 0);
  }

  mcmf.run(source, sink, S);

  const filledBy = new Map<number, Player>();
  for (const { player, slot, edge } of candidateEdges) {
    if (edge.cap === 0) filledBy.set(slot, players[player]);
  }

  let totalScore = 0;
  const assignments = instances.map(({ slot, index }, j): OptimalSlotAssignment => {
    const player = filledBy.get(j) ?? null;
    if (player) totalScore += player.compositeScore ?? 0;
    return { slot: slot.code, slotIndex: index, player };
  });

  return { assignments, totalScore };
}
