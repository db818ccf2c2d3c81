import { describe, expect, it } from 'vitest';
import type { FilterNode } from '@/types/program';
import { FilterGraph, renderFilterGraph, renderNode } from './filter-graph';

function node(filter: string, inputs: string[], outputs: string[], params = ''): FilterNode {
  return { filter, params, inputs, outputs, owner: 'test' };
}

describe('FilterGraph', () => {
  it('returns the first output label when adding', () => {
    const graph = new FilterGraph();
    expect(graph.add(node('split', ['0:v'], ['a', 'b'], '2'))).toBe('a');
    expect(graph.chain('test', 'a', 'null', '', 'c')).toBe('c');
    expect(graph.size).toBe(2);
  });

  it('copies nodes so callers cannot mutate the graph', () => {
    const graph = new FilterGraph();
    graph.chain('test', '0:v', 'null', '', 'out');
    const [first] = graph.getNodes();
    first.outputs.push('extra');
    expect(graph.getNodes()[0].outputs).toEqual(['out']);
  });

  it('orders nodes so producers come before consumers', () => {
    const graph = new FilterGraph();
    graph.add(node('overlay', ['bg', 'fg'], ['out']));
    graph.chain('test', '1:v', 'format', 'rgba', 'fg');
    graph.chain('test', '0:v', 'format', 'rgba', 'bg');

    const sorted = graph.validate(2, ['out']);
    expect(sorted.map((entry) => entry.outputs[0])).toEqual(['bg', 'fg', 'out']);
  });

  it('detects cycles', () => {
    const graph = new FilterGraph();
    graph.add(node('x', ['b'], ['a']));
    graph.add(node('y', ['a'], ['b', 'out']));
    expect(() => graph.validate(1, ['out'])).toThrow('Cycle detected in filter graph');
  });

  it('rejects labels produced twice', () => {
    const graph = new FilterGraph();
    graph.chain('test', '0:v', 'null', '', 'a');
    graph.chain('test', '0:v', 'null', '', 'a');
    expect(() => graph.validate(1, ['a'])).toThrow('Label [a] is produced more than once');
  });

  it('rejects pads for missing inputs', () => {
    const graph = new FilterGraph();
    graph.chain('test', '3:v', 'null', '', 'out');
    expect(() => graph.validate(2, ['out'])).toThrow('Input pad [3:v] refers to a missing input');
  });

  it('rejects labels that are never produced', () => {
    const graph = new FilterGraph();
    graph.chain('test', 'ghost', 'null', '', 'out');
    expect(() => graph.validate(1, ['out'])).toThrow('Label [ghost] is consumed but never produced');
  });

  it('rejects dangling labels', () => {
    const graph = new FilterGraph();
    graph.add(node('split', ['0:v'], ['out', 'unused']));
    expect(() => graph.validate(1, ['out'])).toThrow('Label [unused] is consumed 0 times, expected once');
  });

  it('rejects outputs that are also consumed', () => {
    const graph = new FilterGraph();
    graph.chain('test', '0:v', 'null', '', 'out');
    graph.chain('test', 'out', 'null', '', 'other');
    expect(() => graph.validate(1, ['out', 'other'])).toThrow(
      'Output label [out] is also consumed inside the graph'
    );
  });

  it('rejects declared outputs that are never produced', () => {
    const graph = new FilterGraph();
    graph.chain('test', '0:v', 'null', '', 'out');
    expect(() => graph.validate(1, ['out', 'aout'])).toThrow('Output label [aout] is never produced');
  });
});

describe('renderFilterGraph', () => {
  it('renders labels, filter and params', () => {
    expect(renderNode(node('overlay', ['bg', 'l0_shift'], ['vout'], 'x=0:y=0'))).toBe(
      '[bg][l0_shift]overlay=x=0:y=0[vout]'
    );
    expect(renderNode(node('alphamerge', ['c', 'm'], ['o']))).toBe('[c][m]alphamerge[o]');
  });

  it('joins nodes with semicolons', () => {
    expect(
      renderFilterGraph([node('format', ['0:v'], ['bg'], 'rgba'), node('null', ['bg'], ['vout'])])
    ).toBe('[0:v]format=rgba[bg];[bg]null[vout]');
  });
});
