import type { Relationship } from '@/lib/relationships/types';

export interface TraversalOptions {
  maxDepth: number;
  /** Maximum number of nodes visited, seeds included */
  limit: number;
}

export interface TraversalResult {
  /** Visit order: seeds first, then each BFS level */
  order: string[];
  depthById: Map<string, number>;
  truncated: boolean;
}

/**
 * Breadth-first traversal over relationships treated as undirected.
 * Seeds and neighbors are visited in id order, so the same graph and seeds
 * always give the same node set.
 */
export class TraversalQueries {
  private adjacency = new Map<string, string[]>();

  constructor(relationships: Relationship[]) {
    const neighbors = new Map<string, Set<string>>();
    const link = (from: string, to: string) => {
      const set = neighbors.get(from) ?? new Set<string>();
      set.add(to);
      neighbors.set(from, set);
    };

    for (const rel of relationships) {
      link(rel.sourceId, rel.targetId);
      link(rel.targetId, rel.sourceId);
    }

    for (const [id, set] of neighbors) {
      this.adjacency.set(id, [...set].sort());
    }
  }

  /** Every entity with at least one relationship */
  nodeIds(): string[] {
    return [...this.adjacency.keys()];
  }

  neighbors(id: string): string[] {
    return this.adjacency.get(id) ?? [];
  }

  degree(id: string): number {
    return this.neighbors(id).length;
  }

  bfs(seedIds: string[], options: TraversalOptions): TraversalResult {
    const seeds = [...new Set(seedIds)].sort();
    const depthById = new Map<string, number>();
    const order: string[] = [];

    for (const id of seeds.slice(0, options.limit)) {
      depthById.set(id, 0);
      order.push(id);
    }
    let truncated = seeds.length > options.limit;
    let frontier = [...order];

    for (let depth = 1; depth <= options.maxDepth && frontier.length > 0 && !truncated; depth++) {
      const next: string[] = [];

      for (const id of frontier) {
        for (const neighbor of this.neighbors(id)) {
          if (depthById.has(neighbor)) continue;
          if (order.length >= options.limit) {
            truncated = true;
            break;
          }
          depthById.set(neighbor, depth);
          order.push(neighbor);
          next.push(neighbor);
        }
        if (truncated) break;
      }

      frontier = next;
    }

    return { order, depthById, truncated };
  }
}
