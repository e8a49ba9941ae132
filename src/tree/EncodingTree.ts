import { HuffmanError } from '../errors';
import { ExtSymbol, FrequencyTable, NOT_A_SYMBOL } from '../symbols';
import { PriorityQueue } from './PriorityQueue';

export interface LeafNode {
  kind: 'leaf';
  symbol: ExtSymbol;
  weight: number;
}

export interface InternalNode {
  kind: 'internal';
  /** Always NOT_A_SYMBOL. */
  symbol: ExtSymbol;
  /** Sum of the weights of both children. */
  weight: number;
  zero: TreeNode;
  one: TreeNode;
}

/** Node of a Huffman encoding tree. Each node has exactly one parent. */
export type TreeNode = LeafNode | InternalNode;

export function isLeaf(node: TreeNode): node is LeafNode {
  return node.kind === 'leaf';
}

/**
 * Build a Huffman encoding tree from a frequency table and return its root.
 *
 * Leaves enter the queue in ascending symbol order and equal weights are
 * dequeued first-in first-out, so the tree depends only on the table's
 * contents and not on its iteration order. The first node dequeued in each
 * merge becomes the `zero` child, the second the `one` child.
 *
 * A table with a single entry yields a lone leaf, whose codeword is empty.
 *
 * @throws HuffmanError if the table is empty.
 */
export function buildEncodingTree(frequencies: FrequencyTable): TreeNode {
  if (frequencies.size === 0) {
    throw new HuffmanError('Cannot build an encoding tree from an empty frequency table');
  }

  const queue = new PriorityQueue<TreeNode>();
  const symbols = [...frequencies.keys()].sort((a, b) => a - b);
  for (const symbol of symbols) {
    const weight = frequencies.get(symbol) ?? 0;
    queue.enqueue({ kind: 'leaf', symbol, weight }, weight);
  }

  while (queue.size > 1) {
    const zero = queue.dequeue();
    const one = queue.dequeue();
    const weight = zero.weight + one.weight;
    queue.enqueue({ kind: 'internal', symbol: NOT_A_SYMBOL, weight, zero, one }, weight);
  }

  return queue.dequeue();
}

/** Number of leaves under `root`. */
export function countLeaves(root: TreeNode): number {
  if (isLeaf(root)) return 1;
  return countLeaves(root.zero) + countLeaves(root.one);
}

/** Length of the longest root-to-leaf path (0 for a lone leaf). */
export function treeDepth(root: TreeNode): number {
  if (isLeaf(root)) return 0;
  return 1 + Math.max(treeDepth(root.zero), treeDepth(root.one));
}
