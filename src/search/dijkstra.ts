import { PreconditionViolationError } from "../errors.js";
import { PathSearchBase, type Traversal } from "./base.js";
import { MinHeap } from "./minHeap.js";

/**
 * Shortest path by cumulative weight. Requires non-negative weights.
 *
 * Among unsettled vertices at the same tentative distance the one inserted
 * into the graph first is settled first. Vertices that were never reached
 * have no distance at all; once the queue runs dry every remaining vertex is
 * unreachable and the search stops.
 */
export class DijkstraSearch<T> extends PathSearchBase<T> {
  override readonly algorithm = "dijkstra";

  protected override checkPreconditions(): void {
    if (this.graph.hasNegativeWeights()) {
      throw new PreconditionViolationError("Dijkstra cannot handle negative weights", {
        hint: "use non-negative edge weights or the breadth-first search",
      });
    }
  }

  protected override traverse(start: number, end: number): Traversal {
    const distances = new Map<number, number>([[start, 0]]);
    const predecessors = new Map<number, number>();
    const settled = new Set<number>();
    const visitedOrder: number[] = [];
    const queue = new MinHeap();
    queue.enqueue({ vertex: start, priority: 0 });

    for (let entry = queue.dequeue(); entry; entry = queue.dequeue()) {
      const current = entry.vertex;
      if (settled.has(current)) {
        continue;
      }
      visitedOrder.push(current);
      if (current === end) {
        return { reached: true, predecessors, visitedOrder };
      }
      settled.add(current);

      const base = entry.priority;
      for (const [neighbour, weight] of this.graph.vertexAt(current).neighbours()) {
        if (settled.has(neighbour)) {
          continue;
        }
        const tentative = base + weight;
        const known = distances.get(neighbour);
        if (known === undefined || tentative < known) {
          distances.set(neighbour, tentative);
          predecessors.set(neighbour, current);
          queue.enqueue({ vertex: neighbour, priority: tentative });
        }
      }
    }

    return { reached: false, predecessors, visitedOrder };
  }
}
