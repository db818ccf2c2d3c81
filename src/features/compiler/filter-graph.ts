/**
 * Filter Graph
 *
 * Ordered list of filter nodes connected by labels, with the structural
 * checks run before a graph is emitted.
 */

import type { FilterNode } from '@/types/program';

const INPUT_PAD = /^(\d+):([va])$/;

export class FilterGraph {
  private nodes: FilterNode[] = [];

  /**
   * Append a node; returns its first output label
   */
  add(node: FilterNode): string {
    this.nodes.push({
      ...node,
      inputs: [...node.inputs],
      outputs: [...node.outputs],
    });
    return node.outputs[0];
  }

  /**
   * Append a single-input, single-output node
   */
  chain(owner: string, input: string, filter: string, params: string, output: string): string {
    return this.add({ filter, params, inputs: [input], outputs: [output], owner });
  }

  getNodes(): FilterNode[] {
    return this.nodes.map((node) => ({ ...node, inputs: [...node.inputs], outputs: [...node.outputs] }));
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Check the graph and return its nodes in dependency order.
   *
   * - every label is produced by exactly one node
   * - input pads (`2:v`) refer to an existing input
   * - every produced label is consumed once, except the declared outputs
   * - no cycles
   */
  validate(inputCount: number, outputs: string[]): FilterNode[] {
    const producers = new Map<string, FilterNode>();
    for (const node of this.nodes) {
      for (const label of node.outputs) {
        if (producers.has(label) || INPUT_PAD.test(label)) {
          throw new Error(`Label [${label}] is produced more than once`);
        }
        producers.set(label, node);
      }
    }

    const consumers = new Map<string, number>();
    for (const node of this.nodes) {
      for (const label of node.inputs) {
        const pad = INPUT_PAD.exec(label);
        if (pad) {
          if (Number(pad[1]) >= inputCount) {
            throw new Error(`Input pad [${label}] refers to a missing input`);
          }
          continue;
        }
        if (!producers.has(label)) {
          throw new Error(`Label [${label}] is consumed but never produced`);
        }
        consumers.set(label, (consumers.get(label) ?? 0) + 1);
      }
    }

    for (const label of producers.keys()) {
      const uses = consumers.get(label) ?? 0;
      const isOutput = outputs.includes(label);
      if (isOutput && uses > 0) {
        throw new Error(`Output label [${label}] is also consumed inside the graph`);
      }
      if (!isOutput && uses !== 1) {
        throw new Error(`Label [${label}] is consumed ${uses} times, expected once`);
      }
    }
    for (const label of outputs) {
      if (!producers.has(label)) {
        throw new Error(`Output label [${label}] is never produced`);
      }
    }

    return this.topologicalSort(producers);
  }

  private topologicalSort(producers: Map<string, FilterNode>): FilterNode[] {
    const result: FilterNode[] = [];
    const visited = new Set<FilterNode>();
    const visiting = new Set<FilterNode>();

    const visit = (node: FilterNode): void => {
      if (visited.has(node)) return;
      if (visiting.has(node)) {
        throw new Error('Cycle detected in filter graph');
      }

      visiting.add(node);

      // Visit dependencies first
      for (const label of node.inputs) {
        const producer = producers.get(label);
        if (producer) visit(producer);
      }

      visiting.delete(node);
      visited.add(node);
      result.push(node);
    };

    for (const node of this.nodes) {
      visit(node);
    }

    return result.map((node) => ({ ...node, inputs: [...node.inputs], outputs: [...node.outputs] }));
  }
}

export function renderNode(node: FilterNode): string {
  const inputs = node.inputs.map((label) => `[${label}]`).join('');
  const outputs = node.outputs.map((label) => `[${label}]`).join('');
  const body = node.params ? `${node.filter}=${node.params}` : node.filter;
  return `${inputs}${body}${outputs}`;
}

/**
 * Filter graph text for `-filter_complex`
 */
export function renderFilterGraph(nodes: readonly FilterNode[]): string {
  return nodes.map(renderNode).join(';');
}
