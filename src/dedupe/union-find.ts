/**
 * Labelled Union-Find
 *
 * Disjoint sets over record indices with path compression and union by rank.
 * Each set carries a label: -1 while it holds a single unmatched record, then
 * the number handed out when the set was first formed by a match. When two
 * labelled sets merge, the lower (earlier) label survives.
 *
 * @module dedupe/union-find
 */

/** Label of a set that has never been merged */
export const UNLABELLED = -1;

export class LabelledUnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;
  private readonly labels: Int32Array;
  private nextLabel = 0;

  /**
   * @param size - Number of elements, indexed 0..size-1
   */
  constructor(readonly size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    this.labels = new Int32Array(size).fill(UNLABELLED);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  /**
   * Root of the set containing `element`, compressing the path on the way.
   */
  find(element: number): number {
    let root = element;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    let current = element;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }

    return root;
  }

  /**
   * Whether two elements are already in the same set.
   */
  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Merge the sets of `a` and `b`.
   *
   * @returns The label of the merged set
   */
  union(a: number, b: number): number {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return this.labels[rootA];
    }

    const label = this.mergedLabel(this.labels[rootA], this.labels[rootB]);

    let root = rootA;
    let child = rootB;
    if (this.rank[rootA] < this.rank[rootB]) {
      root = rootB;
      child = rootA;
    } else if (this.rank[rootA] === this.rank[rootB]) {
      this.rank[rootA]++;
    }

    this.parent[child] = root;
    this.labels[root] = label;
    return label;
  }

  /**
   * Label of the set containing `element`, or UNLABELLED.
   */
  labelOf(element: number): number {
    return this.labels[this.find(element)];
  }

  /**
   * Number of labels handed out so far, including ones absorbed by merges.
   */
  get labelsIssued(): number {
    return this.nextLabel;
  }

  private mergedLabel(labelA: number, labelB: number): number {
    if (labelA === UNLABELLED && labelB === UNLABELLED) {
      return this.nextLabel++;
    }
    if (labelA === UNLABELLED) return labelB;
    if (labelB === UNLABELLED) return labelA;
    return Math.min(labelA, labelB);
  }
}
