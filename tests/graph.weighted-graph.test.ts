import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidArgumentError } from "../src/errors.js";
import { createEdge } from "../src/graph/edge.js";
import { createSampleGraph } from "../src/graph/sample.js";
import { WeightedGraph, type ReadonlyWeightedGraph } from "../src/graph/weightedGraph.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";

function buildTriangle(): WeightedGraph<string> {
  const graph = new WeightedGraph<string>();
  graph.addVertex("a");
  graph.addVertex("b");
  graph.addVertex("c");
  graph.addEdge("a", "b", 2);
  graph.addEdge("b", "c", 3);
  graph.addEdge("c", "a", 1);
  return graph;
}

describe("WeightedGraph", () => {
  it("keeps vertices in insertion order with stable indices", () => {
    const graph = buildTriangle();
    expect(graph.listVertices()).to.deep.equal(["a", "b", "c"]);
    expect(graph.indexOf("c")).to.equal(2);
    expect(graph.vertexAt(1).data).to.equal("b");
    expect(graph.vertexCount).to.equal(3);
    expect(graph.edgeCount).to.equal(3);
  });

  it("stores directed edges only", () => {
    const graph = buildTriangle();
    expect(graph.getWeight("a", "b")).to.equal(2);
    expect(graph.getWeight("b", "a")).to.equal(undefined);
    expect(graph.getOutgoing("b")).to.deep.equal([{ destination: "c", weight: 3 }]);
  });

  it("overwrites the weight of an existing edge in place", () => {
    const graph = new WeightedGraph<string>();
    for (const vertex of ["x", "y", "z"]) {
      graph.addVertex(vertex);
    }
    graph.addEdge("x", "y", 5);
    graph.addEdge("x", "z", 1);
    graph.addEdge("x", "y", 7);

    expect(graph.getOutgoing("x")).to.deep.equal([
      { destination: "y", weight: 7 },
      { destination: "z", weight: 1 },
    ]);
    expect(graph.edgeCount).to.equal(2);
  });

  it("rejects edges with an unknown endpoint without mutating the graph", () => {
    const graph = buildTriangle();
    const before = graph.listEdges();

    expect(() => graph.addEdge("a", "missing", 1)).to.throw(InvalidArgumentError, "Unknown destination vertex 'missing'");
    expect(() => graph.addEdge("ghost", "a", 1)).to.throw(InvalidArgumentError, "Unknown source vertex 'ghost'");
    expect(graph.listEdges()).to.deep.equal(before);
  });

  it("rejects non-finite weights", () => {
    const graph = buildTriangle();
    expect(() => graph.addEdge("a", "c", Number.NaN)).to.throw(InvalidArgumentError, /finite number/);
    expect(() => graph.addEdge("a", "c", Number.POSITIVE_INFINITY)).to.throw(InvalidArgumentError);
    expect(graph.getWeight("a", "c")).to.equal(undefined);
  });

  it("inserts edge batches atomically", () => {
    const graph = buildTriangle();
    expect(() => graph.addEdges([createEdge("a", "c", 9), createEdge("c", "nowhere", 1)])).to.throw(
      InvalidArgumentError,
    );
    expect(graph.getWeight("a", "c")).to.equal(undefined);

    graph.addEdges([createEdge("a", "c", 9), createEdge("b", "a", 4)]);
    expect(graph.getWeight("a", "c")).to.equal(9);
    expect(graph.getWeight("b", "a")).to.equal(4);
  });

  it("resets outgoing edges when a vertex is added again while keeping incoming ones", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ stream: null, onEntry: (entry) => entries.push(entry) });
    const graph = new WeightedGraph<string>({ logger });
    graph.addVertex("a");
    graph.addVertex("b");
    graph.addEdge("a", "b", 1);
    graph.addEdge("b", "a", 2);

    graph.addVertex("b");

    expect(graph.vertexCount).to.equal(2);
    expect(graph.indexOf("b")).to.equal(1);
    expect(graph.getOutgoing("b")).to.deep.equal([]);
    expect(graph.getWeight("a", "b")).to.equal(1);
    expect(entries.map((entry) => [entry.message, entry.component, entry.payload])).to.deep.equal([
      ["graph_vertex_reset", "graph", { index: 1, dropped_edges: 1 }],
    ]);
  });

  it("keys object payloads by identity", () => {
    const graph = new WeightedGraph<{ name: string }>();
    const first = { name: "hub" };
    const twin = { name: "hub" };
    graph.addVertex(first);
    graph.addVertex(twin);

    expect(graph.vertexCount).to.equal(2);
    expect(graph.hasVertex(first)).to.equal(true);
    expect(graph.hasVertex({ name: "hub" })).to.equal(false);
  });

  it("reports negative weights", () => {
    const graph = buildTriangle();
    expect(graph.hasNegativeWeights()).to.equal(false);
    graph.addEdge("a", "c", -1);
    expect(graph.hasNegativeWeights()).to.equal(true);
  });

  it("lists edges grouped by source", () => {
    expect(createSampleGraph().listEdges()).to.deep.equal([
      { source: "A", destination: "B", weight: 1 },
      { source: "A", destination: "C", weight: 4 },
      { source: "B", destination: "C", weight: 2 },
      { source: "B", destination: "D", weight: 5 },
      { source: "C", destination: "D", weight: 3 },
      { source: "C", destination: "E", weight: 6 },
      { source: "D", destination: "E", weight: 1 },
    ]);
  });

  it("hands out vertex views that cannot add or drop edges", () => {
    const graph = buildTriangle();
    const view: ReadonlyWeightedGraph<string> = graph;
    const vertex = view.vertexAt(0);

    expect(vertex).to.not.have.property("connect");
    expect(vertex).to.not.have.property("reset");
    expect(view.getVertex("b")).to.not.have.property("connect");
    expect(Array.from(vertex.neighbours())).to.deep.equal([[1, 2]]);

    graph.addEdge("a", "c", 4);
    expect(vertex.degree).to.equal(2);
    expect(vertex.weightTo(2)).to.equal(4);
  });

  it("names null-prototype payloads in edge errors", () => {
    const graph = new WeightedGraph<object>();
    const known: object = Object.create(null);
    graph.addVertex(known);

    expect(() => graph.addEdge(Object.create(null), known, 1)).to.throw(
      InvalidArgumentError,
      "Unknown source vertex '[object Object]'",
    );
    expect(() => graph.addEdge(known, known, Number.NaN)).to.throw(InvalidArgumentError, /finite number/);
  });

  it("throws a RangeError for an unknown arena index", () => {
    expect(() => buildTriangle().vertexAt(3)).to.throw(RangeError, "No vertex at index 3");
  });
});
