import { MinHeap } from "../utils/algorithms";
import { assert } from "../utils/errorHandling";
import { EmptyInputError } from "./errors";
import { FrequencyTable } from "./frequencyTable";

export type HuffmanLeaf = {
  kind: "leaf";
  byte: number;
  weight: number;
};

// left/right are indices into the owning tree's node arena.
export type HuffmanInternal = {
  kind: "internal";
  weight: number;
  left: number;
  right: number;
};

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

// Flat arena of nodes. Children always sit at lower indices than their parent,
// but consumers should go through `root` and the child indices rather than
// relying on arena order.
export type HuffmanTree = {
  readonly nodes: readonly HuffmanNode[];
  readonly root: number;
};

// Builds the tree by repeatedly merging the two lightest nodes.
//
// Ties on weight go to the node created first. Creation order is the arena
// index: leaves are created in ascending byte order, then each merge appends
// its internal node. The first node popped becomes the left child.
//
// A table with a single byte yields a tree that is just that leaf.
export function buildHuffmanTree(table: FrequencyTable): HuffmanTree {
  if (table.size === 0) {
    throw new EmptyInputError("Cannot build a Huffman tree from an empty frequency table");
  }

  const nodes: HuffmanNode[] = [];
  const heap = new MinHeap<number>((a, b) => nodes[a].weight - nodes[b].weight || a - b);

  const sortedBytes = [...table.keys()].sort((a, b) => a - b);
  for (const byte of sortedBytes) {
    const weight = table.get(byte) ?? 0;
    assert(weight > 0, `frequency for byte ${byte} must be positive`);
    nodes.push({ kind: "leaf", byte, weight });
    heap.push(nodes.length - 1);
  }

  while (heap.size > 1) {
    const left = heap.pop();
    const right = heap.pop();
    assert(left !== undefined && right !== undefined, "heap underflow while merging");
    nodes.push({
      kind: "internal",
      weight: nodes[left].weight + nodes[right].weight,
      left,
      right,
    });
    heap.push(nodes.length - 1);
  }

  const root = heap.pop();
  assert(root !== undefined, "heap is empty after merging");
  return { nodes, root };
}

export function getNode(tree: HuffmanTree, index: number): HuffmanNode {
  const node = tree.nodes[index];
  assert(node !== undefined, `node index ${index} is outside the tree (${tree.nodes.length} nodes)`);
  return node;
}

export function countLeaves(tree: HuffmanTree): number {
  let leaves = 0;
  for (const node of tree.nodes) {
    if (node.kind === "leaf") leaves++;
  }
  return leaves;
}

// Structural equality: same shape, same leaf bytes. Weights are ignored since
// reconstructed trees do not carry them.
export function treesHaveSameShape(a: HuffmanTree, b: HuffmanTree): boolean {
  const stack: [number, number][] = [[a.root, b.root]];
  while (stack.length > 0) {
    const pair = stack.pop();
    if (!pair) break;
    const na = getNode(a, pair[0]);
    const nb = getNode(b, pair[1]);
    if (na.kind === "leaf" || nb.kind === "leaf") {
      if (na.kind !== nb.kind) return false;
      if (na.kind === "leaf" && nb.kind === "leaf" && na.byte !== nb.byte) return false;
      continue;
    }
    stack.push([na.right, nb.right], [na.left, nb.left]);
  }
  return true;
}
