import { HuffmanError } from '../../src/errors';
import { countBytes } from '../../src/frequency/FrequencyCounter';
import { FrequencyTable, NOT_A_SYMBOL, PSEUDO_EOF } from '../../src/symbols';
import { getEncodingMap } from '../../src/tree/CodeTable';
import {
  buildEncodingTree,
  countLeaves,
  isLeaf,
  treeDepth,
  TreeNode,
} from '../../src/tree/EncodingTree';

const ascii = (text: string) => new TextEncoder().encode(text);
const A = 0x61;
const B = 0x62;

function leaves(node: TreeNode): TreeNode[] {
  if (isLeaf(node)) return [node];
  return [...leaves(node.zero), ...leaves(node.one)];
}

function checkWeights(node: TreeNode): void {
  if (node.kind === 'leaf') return;
  expect(node.symbol).toBe(NOT_A_SYMBOL);
  expect(node.weight).toBe(node.zero.weight + node.one.weight);
  checkWeights(node.zero);
  checkWeights(node.one);
}

describe('buildEncodingTree', () => {
  it('merges b and EOF first for "aaab"', () => {
    const root = buildEncodingTree(countBytes(ascii('aaab')));
    expect(root.weight).toBe(5);
    if (root.kind !== 'internal') throw new Error('expected an internal root');

    const merged = root.zero;
    if (merged.kind !== 'internal') throw new Error('expected an internal zero branch');
    expect(merged.weight).toBe(2);
    expect(merged.zero).toEqual({ kind: 'leaf', symbol: B, weight: 1 });
    expect(merged.one).toEqual({ kind: 'leaf', symbol: PSEUDO_EOF, weight: 1 });
    expect(root.one).toEqual({ kind: 'leaf', symbol: A, weight: 3 });

    const codes = getEncodingMap(root);
    expect(codes.get(A)).toBe('1');
    expect(codes.get(B)).toBe('00');
    expect(codes.get(PSEUDO_EOF)).toBe('01');
  });

  it('dequeues equal weights in ascending symbol order', () => {
    const codes = getEncodingMap(buildEncodingTree(countBytes(ascii('abcd'))));
    expect(Object.fromEntries(codes)).toEqual({
      [0x63]: '00',
      [0x64]: '01',
      [PSEUDO_EOF]: '10',
      [0x61]: '110',
      [0x62]: '111',
    });
  });

  it('does not depend on the table iteration order', () => {
    const forward: FrequencyTable = new Map([[A, 3], [B, 1], [0x63, 1], [PSEUDO_EOF, 1]]);
    const backward: FrequencyTable = new Map([...forward].reverse());
    expect(buildEncodingTree(backward)).toEqual(buildEncodingTree(forward));
  });

  it('returns a lone leaf for a sentinel-only table', () => {
    const root = buildEncodingTree(countBytes(new Uint8Array(0)));
    expect(root).toEqual({ kind: 'leaf', symbol: PSEUDO_EOF, weight: 1 });
    expect(getEncodingMap(root).get(PSEUDO_EOF)).toBe('');
    expect(treeDepth(root)).toBe(0);
  });

  it('builds a two-leaf tree for a single repeated byte', () => {
    const root = buildEncodingTree(countBytes(ascii('zzzz')));
    expect(countLeaves(root)).toBe(2);
    expect(treeDepth(root)).toBe(1);
    const codes = getEncodingMap(root);
    expect(codes.get(PSEUDO_EOF)).toBe('0');
    expect(codes.get(0x7a)).toBe('1');
  });

  it('keeps exactly one sentinel leaf with weight 1', () => {
    const root = buildEncodingTree(countBytes(ascii('the sentinel is always there')));
    const sentinels = leaves(root).filter(node => node.symbol === PSEUDO_EOF);
    expect(sentinels).toEqual([{ kind: 'leaf', symbol: PSEUDO_EOF, weight: 1 }]);
  });

  it('gives every internal node the sum of its children', () => {
    const data = new Uint8Array(2000);
    for (let i = 0; i < data.length; i++) data[i] = (i * i) % 97;
    const root = buildEncodingTree(countBytes(data));
    checkWeights(root);
    expect(root.weight).toBe(2001);
  });

  it('has one leaf per table entry', () => {
    const table: FrequencyTable = new Map();
    for (let b = 0; b < 256; b++) table.set(b, b + 1);
    table.set(PSEUDO_EOF, 1);
    const root = buildEncodingTree(table);
    expect(countLeaves(root)).toBe(257);
    expect(new Set(leaves(root).map(node => node.symbol)).size).toBe(257);
  });

  it('throws for an empty table', () => {
    expect(() => buildEncodingTree(new Map())).toThrow(HuffmanError);
  });
});
