import { describe, it, expect } from "vitest";
import { PipelineConfigurationError } from "@indexflow/errors";
import type {
  ComponentOutput,
  OutputEdge,
  PipelineComponent,
  PipelineState,
} from "@indexflow/types";
import { PipelineGraph, parseInputRef } from "./pipeline-graph.js";

/** Appends its label to the state's documents and emits on a fixed channel. */
class Stage implements PipelineComponent {
  constructor(
    private readonly label: string,
    private readonly edge: OutputEdge | null = "output_1",
    readonly outgoingEdges = 1,
  ) {}

  async run(state: PipelineState): Promise<ComponentOutput | null> {
    if (this.edge === null) return null;
    const documents = [...state.documents, { id: this.label, content: this.label, meta: {} }];
    return { state: { ...state, documents }, edge: this.edge };
  }
}

const initial: PipelineState = { file: { path: "/tmp/a.txt", meta: {} }, documents: [] };

function labels(state: PipelineState | null): string[] | null {
  return state ? state.documents.map((d) => d.content) : null;
}

describe("parseInputRef", () => {
  it("parses plain node names", () => {
    expect(parseInputRef("PreProcessor")).toEqual({ node: "PreProcessor", edge: null });
  });

  it("parses numbered channels", () => {
    expect(parseInputRef("Classifier.output_3")).toEqual({ node: "Classifier", edge: "output_3" });
  });

  it("rejects other suffixes", () => {
    expect(() => parseInputRef("Classifier.result")).toThrow('Malformed input reference "Classifier.result"');
  });
});

describe("PipelineGraph", () => {
  describe("addNode", () => {
    it("rejects inputs that reference nodes not yet added", () => {
      const graph = new PipelineGraph();
      expect(() => graph.addNode("B", new Stage("B"), ["A"])).toThrow(
        'Input "A" of node "B" does not reference an existing node',
      );
    });

    it("rejects duplicate node names", () => {
      const graph = new PipelineGraph().addNode("A", new Stage("A"), ["File"]);
      expect(() => graph.addNode("A", new Stage("A"), ["File"])).toThrow('Node "A" already exists');
    });

    it("rejects channels beyond the upstream edge count", () => {
      const graph = new PipelineGraph().addNode("C", new Stage("C", "output_1", 2), ["File"]);
      expect(() => graph.addNode("X", new Stage("X"), ["C.output_3"])).toThrow(
        'Node "C" has 2 outputs, "C.output_3" is out of range',
      );
    });

    it("rejects a node named like the root", () => {
      expect(() => new PipelineGraph().addNode("File", new Stage("F"), ["File"])).toThrow(
        PipelineConfigurationError,
      );
    });

    it("rejects nodes without inputs", () => {
      expect(() => new PipelineGraph().addNode("A", new Stage("A"), [])).toThrow(
        'Node "A" needs at least one input',
      );
    });
  });

  describe("validate", () => {
    it("returns the single terminal node", () => {
      const graph = new PipelineGraph()
        .addNode("A", new Stage("A"), ["File"])
        .addNode("B", new Stage("B"), ["A"]);
      expect(graph.validate()).toBe("B");
    });

    it("fails when two nodes have no consumers", () => {
      const graph = new PipelineGraph()
        .addNode("A", new Stage("A"), ["File"])
        .addNode("B", new Stage("B"), ["A"])
        .addNode("C", new Stage("C"), ["A"]);
      expect(() => graph.validate()).toThrow(
        "Pipeline must have exactly one terminal node, found 2: B, C",
      );
    });

    it("fails for an empty graph", () => {
      expect(() => new PipelineGraph().validate()).toThrow(
        "Pipeline must have exactly one terminal node, found 0",
      );
    });
  });

  describe("run", () => {
    function branching(edge: OutputEdge | null): PipelineGraph {
      return new PipelineGraph()
        .addNode("Router", new Stage("router", edge, 3), ["File"])
        .addNode("Left", new Stage("left"), ["Router.output_1"])
        .addNode("Right", new Stage("right"), ["Router.output_2"])
        .addNode("Join", new Stage("join"), ["Left", "Right"]);
    }

    it("follows only the channel the router emitted", async () => {
      const result = await branching("output_2").run(initial);

      expect(result.visited).toEqual(["Router", "Right", "Join"]);
      expect(labels(result.output)).toEqual(["router", "right", "join"]);
    });

    it("drops the item when the router emits a channel with no consumer", async () => {
      const result = await branching("output_3").run(initial);

      expect(result.visited).toEqual(["Router"]);
      expect(result.output).toBeNull();
    });

    it("drops the item when a component emits nothing", async () => {
      const result = await branching(null).run(initial);

      expect(result.visited).toEqual(["Router"]);
      expect(result.output).toBeNull();
    });

    it("runs a merge node once with the first input that produced output", async () => {
      const graph = new PipelineGraph()
        .addNode("A", new Stage("a"), ["File"])
        .addNode("B", new Stage("b"), ["File"])
        .addNode("Join", new Stage("join"), ["B", "A"]);

      const result = await graph.run(initial);

      expect(result.visited).toEqual(["A", "B", "Join"]);
      expect(labels(result.output)).toEqual(["b", "join"]);
    });

    it("validates before running", async () => {
      const graph = new PipelineGraph()
        .addNode("A", new Stage("a"), ["File"])
        .addNode("B", new Stage("b"), ["File"]);

      await expect(graph.run(initial)).rejects.toThrow("exactly one terminal node");
    });
  });
});
