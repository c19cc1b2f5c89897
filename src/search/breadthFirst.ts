import { PathSearchBase, type Traversal } from "./base.js";

/**
 * Shortest path by edge count. Neighbours are expanded in edge insertion
 * order, so among equally short paths the first one discovered wins.
 */
export class BreadthFirstSearch<T> extends PathSearchBase<T> {
  override readonly algorithm = "bfs";

  protected override traverse(start: number, end: number): Traversal {
    const visited = new Set<number>([start]);
    const predecessors = new Map<number, number>();
    const visitedOrder: number[] = [];
    const queue: number[] = [start];
    let head = 0;

    while (head < queue.length) {
      const current = queue[head];
      head += 1;
      visitedOrder.push(current);
      if (current === end) {
        return { reached: true, predecessors, visitedOrder };
      }
      for (const [neighbour] of this.graph.vertexAt(current).neighbours()) {
        if (visited.has(neighbour)) {
          continue;
        }
        visited.add(neighbour);
        predecessors.set(neighbour, current);
        queue.push(neighbour);
      }
    }

    return { reached: false, predecessors, visitedOrder };
  }
}
