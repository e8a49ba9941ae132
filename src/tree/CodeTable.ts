import { ExtSymbol } from '../symbols';
import { TreeNode } from './EncodingTree';

/**
 * Walk the tree depth-first (`zero` before `one`) and call `visit` for
 * every leaf with the path leading to it.
 */
function walkLeaves(
  node: TreeNode,
  path: string,
  visit: (symbol: ExtSymbol, code: string) => void,
): void {
  if (node.kind === 'leaf') {
    visit(node.symbol, path);
    return;
  }
  walkLeaves(node.zero, path + '0', visit);
  walkLeaves(node.one, path + '1', visit);
}

/** Symbol → codeword, used when encoding. */
export function getEncodingMap(root: TreeNode): Map<ExtSymbol, string> {
  const codes = new Map<ExtSymbol, string>();
  walkLeaves(root, '', (symbol, code) => codes.set(symbol, code));
  return codes;
}

/** Codeword → symbol, the inverse of {@link getEncodingMap}. */
export function getDecodingMap(root: TreeNode): Map<string, ExtSymbol> {
  const symbols = new Map<string, ExtSymbol>();
  walkLeaves(root, '', (symbol, code) => symbols.set(code, symbol));
  return symbols;
}
