import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { WeightedGraph } from "../src/graph/weightedGraph.js";
import { BreadthFirstSearch } from "../src/search/breadthFirst.js";
import { DijkstraSearch } from "../src/search/dijkstra.js";

interface RandomGraph {
  readonly size: number;
  readonly edges: Array<{ source: number; destination: number; weight: number }>;
  readonly start: number;
  readonly end: number;
}

const randomGraphArb: fc.Arbitrary<RandomGraph> = fc.integer({ min: 1, max: 6 }).chain((size) =>
  fc.record({
    size: fc.constant(size),
    edges: fc.array(
      fc.record({
        source: fc.integer({ min: 0, max: size - 1 }),
        destination: fc.integer({ min: 0, max: size - 1 }),
        weight: fc.integer({ min: 0, max: 9 }),
      }),
      { maxLength: 14 },
    ),
    start: fc.integer({ min: 0, max: size - 1 }),
    end: fc.integer({ min: 0, max: size - 1 }),
  }),
);

function buildGraph(input: RandomGraph): WeightedGraph<number> {
  const graph = new WeightedGraph<number>();
  for (let vertex = 0; vertex < input.size; vertex += 1) {
    graph.addVertex(vertex);
  }
  for (const edge of input.edges) {
    graph.addEdge(edge.source, edge.destination, edge.weight);
  }
  return graph;
}

/** Enumerates every simple path and keeps the best hop count and weight. */
function bruteForce(graph: WeightedGraph<number>, start: number, end: number): { hops: number; weight: number } | null {
  let best: { hops: number; weight: number } | null = null;
  const onPath = new Set<number>([start]);

  const visit = (current: number, hops: number, weight: number): void => {
    if (current === end) {
      best = {
        hops: best === null ? hops : Math.min(best.hops, hops),
        weight: best === null ? weight : Math.min(best.weight, weight),
      };
      return;
    }
    for (const { destination, weight: edgeWeight } of graph.getOutgoing(current)) {
      if (onPath.has(destination)) {
        continue;
      }
      onPath.add(destination);
      visit(destination, hops + 1, weight + edgeWeight);
      onPath.delete(destination);
    }
  };

  visit(start, 0, 0);
  return best;
}

/** Checks that consecutive vertices are joined by edges and sums their weights. */
function walk(graph: WeightedGraph<number>, path: number[]): number {
  let total = 0;
  for (let index = 1; index < path.length; index += 1) {
    const weight = graph.getWeight(path[index - 1], path[index]);
    expect(weight, `edge ${path[index - 1]} -> ${path[index]} exists`).to.be.a("number");
    total += weight ?? 0;
  }
  return total;
}

describe("search optimality properties", () => {
  it("breadth-first search returns a path with the fewest edges", () => {
    fc.assert(
      fc.property(randomGraphArb, (input) => {
        const graph = buildGraph(input);
        const expected = bruteForce(graph, input.start, input.end);
        const path = new BreadthFirstSearch(graph).execute(input.start, input.end);
        if (expected === null) {
          expect(path).to.equal(null);
          return;
        }
        expect(path).to.not.equal(null);
        const route = path ?? [];
        walk(graph, route);
        expect(route[0]).to.equal(input.start);
        expect(route[route.length - 1]).to.equal(input.end);
        expect(route.length - 1).to.equal(expected.hops);
      }),
      { numRuns: 200 },
    );
  });

  it("dijkstra returns a path of minimal total weight", () => {
    fc.assert(
      fc.property(randomGraphArb, (input) => {
        const graph = buildGraph(input);
        const expected = bruteForce(graph, input.start, input.end);
        const outcome = new DijkstraSearch(graph).search(input.start, input.end);
        if (expected === null) {
          expect(outcome.path).to.equal(null);
          return;
        }
        const route = outcome.path ?? [];
        expect(route[0]).to.equal(input.start);
        expect(route[route.length - 1]).to.equal(input.end);
        expect(walk(graph, route)).to.equal(expected.weight);
        expect(outcome.distance).to.equal(expected.weight);
      }),
      { numRuns: 200 },
    );
  });
});
