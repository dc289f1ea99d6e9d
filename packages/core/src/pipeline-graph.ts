import { PipelineConfigurationError } from "@indexflow/errors";
import {
  ROOT_NODE,
  type ComponentOutput,
  type OutputEdge,
  type PipelineComponent,
  type PipelineRunResult,
  type PipelineState,
} from "@indexflow/types";

interface InputRef {
  node: string;
  /** Specific channel, or null for any output of the node. */
  edge: OutputEdge | null;
}

interface GraphNode {
  name: string;
  component: PipelineComponent;
  inputs: InputRef[];
}

const INPUT_REF = /^([^.]+)(?:\.output_(\d+))?$/;

export function parseInputRef(ref: string): InputRef {
  const match = INPUT_REF.exec(ref);
  const node = match?.[1];
  if (!match || !node) {
    throw new PipelineConfigurationError(`Malformed input reference "${ref}"`);
  }
  const channel = match[2];
  return { node, edge: channel === undefined ? null : `output_${Number(channel)}` };
}

function edgeNumber(edge: OutputEdge): number {
  return Number(edge.slice("output_".length));
}

/**
 * Directed acyclic graph of pipeline components. Nodes can only consume the
 * root or nodes added before them, so insertion order is a topological order.
 */
export class PipelineGraph {
  private nodes = new Map<string, GraphNode>();
  private terminal: string | null = null;

  addNode(name: string, component: PipelineComponent, inputs: string[]): this {
    if (name === ROOT_NODE || name.includes(".")) {
      throw new PipelineConfigurationError(`Invalid node name "${name}"`);
    }
    if (this.nodes.has(name)) {
      throw new PipelineConfigurationError(`Node "${name}" already exists`);
    }
    if (inputs.length === 0) {
      throw new PipelineConfigurationError(`Node "${name}" needs at least one input`);
    }

    const refs = inputs.map((input) => this.resolveInput(name, input));
    this.nodes.set(name, { name, component, inputs: refs });
    this.terminal = null;
    return this;
  }

  /** Names of the nodes in execution order. */
  get nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  /**
   * Check that exactly one node has no consumers and return its name.
   */
  validate(): string {
    const consumed = new Set<string>();
    for (const node of this.nodes.values()) {
      for (const input of node.inputs) consumed.add(input.node);
    }
    const terminals = this.nodeNames.filter((name) => !consumed.has(name));

    const [terminal] = terminals;
    if (terminals.length !== 1 || terminal === undefined) {
      throw new PipelineConfigurationError(
        `Pipeline must have exactly one terminal node, found ${String(terminals.length)}${
          terminals.length > 0 ? `: ${terminals.join(", ")}` : ""
        }`,
      );
    }
    this.terminal = terminal;
    return terminal;
  }

  /**
   * Drive one item from the root. A node runs at most once, with the first of
   * its inputs that produced output on a matching channel.
   */
  async run(state: PipelineState): Promise<PipelineRunResult> {
    const terminal = this.terminal ?? this.validate();
    const outputs = new Map<string, ComponentOutput | { state: PipelineState; edge: null }>();
    outputs.set(ROOT_NODE, { state, edge: null });
    const visited: string[] = [];

    for (const node of this.nodes.values()) {
      const upstream = node.inputs
        .map((input) => {
          const output = outputs.get(input.node);
          return output && (input.edge === null || input.edge === output.edge) ? output : null;
        })
        .find((output) => output !== null);
      if (!upstream) continue;

      visited.push(node.name);
      const result = await node.component.run(upstream.state);
      if (result) outputs.set(node.name, result);
    }

    return { visited, output: outputs.get(terminal)?.state ?? null };
  }

  private resolveInput(name: string, input: string): InputRef {
    const ref = parseInputRef(input);

    if (ref.node === ROOT_NODE) {
      if (ref.edge !== null) {
        throw new PipelineConfigurationError(`Root input of "${name}" cannot name a channel`);
      }
      return ref;
    }

    const upstream = this.nodes.get(ref.node);
    if (!upstream) {
      throw new PipelineConfigurationError(
        `Input "${input}" of node "${name}" does not reference an existing node`,
      );
    }
    if (ref.edge !== null) {
      const channel = edgeNumber(ref.edge);
      if (channel < 1 || channel > upstream.component.outgoingEdges) {
        throw new PipelineConfigurationError(
          `Node "${ref.node}" has ${String(upstream.component.outgoingEdges)} outputs, "${input}" is out of range`,
        );
      }
    }
    return ref;
  }
}
