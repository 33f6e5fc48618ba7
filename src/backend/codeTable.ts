import { assert } from "../utils/errorHandling";
import { getNode, HuffmanTree } from "./huffmanTree";

export type Bit = 0 | 1;

// byte value -> root-to-leaf path (0 = left, 1 = right). Never empty.
export type CodeTable = ReadonlyMap<number, readonly Bit[]>;

export function buildCodeTable(tree: HuffmanTree): CodeTable {
  const codes = new Map<number, readonly Bit[]>();
  const rootNode = getNode(tree, tree.root);

  // a lone leaf has no path; it gets the single bit 0.
  if (rootNode.kind === "leaf") {
    codes.set(rootNode.byte, [0]);
    return codes;
  }

  const visited = new Set<number>();
  const stack: { index: number; path: Bit[] }[] = [{ index: tree.root, path: [] }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    assert(!visited.has(entry.index), `node ${entry.index} is reachable twice`);
    visited.add(entry.index);

    const node = getNode(tree, entry.index);
    if (node.kind === "leaf") {
      assert(!codes.has(node.byte), `byte ${node.byte} appears in two leaves`);
      codes.set(node.byte, entry.path);
      continue;
    }

    // right pushed first so the left subtree is walked first.
    stack.push({ index: node.right, path: [...entry.path, 1] });
    stack.push({ index: node.left, path: [...entry.path, 0] });
  }

  return codes;
}

export function codeToString(code: readonly Bit[]): string {
  return code.join("");
}

// Sum of code lengths over every occurrence, i.e. the payload size in bits.
export function encodedBitLength(data: Uint8Array, codes: CodeTable): number {
  const lengths = new Array<number>(256).fill(-1);
  for (const [byte, code] of codes) {
    lengths[byte] = code.length;
  }

  let bits = 0;
  for (let i = 0; i < data.length; i++) {
    const len = lengths[data[i]];
    assert(len > 0, `no code for byte ${data[i]}`);
    bits += len;
  }
  return bits;
}
