import { InvalidStateError } from '@recency-cache/shared';

/**
 * A key-holding node of a {@link RecencyList}.
 *
 * The link fields are maintained by the owning list; a node that belongs to no
 * list has all three set to `undefined`.
 */
export class RecencyNode<K> {
  previous: RecencyNode<K> | undefined;
  next: RecencyNode<K> | undefined;
  list: RecencyList<K> | undefined;

  constructor(public readonly key: K) {}
}

/**
 * Intrusive doubly-linked list ordered from most-recently-used (head) to
 * least-recently-used (tail).
 *
 * Every structural edit is O(1): nodes know their neighbours, so unlinking
 * from the middle never scans.
 */
export class RecencyList<K> implements Iterable<K> {
  private head: RecencyNode<K> | undefined;
  private tail: RecencyNode<K> | undefined;
  private length = 0;

  get count(): number {
    return this.length;
  }

  /** Most-recently-used node */
  get first(): RecencyNode<K> | undefined {
    return this.head;
  }

  /** Least-recently-used node, the next eviction candidate */
  get last(): RecencyNode<K> | undefined {
    return this.tail;
  }

  /**
   * Makes a detached node the new head.
   * @throws InvalidStateError if the node is already attached to a list
   */
  addFirst(node: RecencyNode<K>): void {
    if (node.list !== undefined) {
      throw new InvalidStateError('Node belongs to another list');
    }

    if (this.head) {
      this.head.previous = node;
    }

    node.list = this;
    node.next = this.head;
    node.previous = undefined;
    this.head = node;
    this.length++;

    if (!this.tail) {
      this.tail = node;
    }
  }

  /**
   * Splices a node out of this list and detaches it.
   * @throws InvalidStateError if the node is not in this list
   */
  remove(node: RecencyNode<K>): void {
    if (node.list !== this) {
      throw new InvalidStateError('Node belongs to another list');
    }

    if (node.previous) {
      node.previous.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.previous = node.previous;
    } else {
      this.tail = node.previous;
    }

    this.length--;

    node.list = undefined;
    node.next = undefined;
    node.previous = undefined;
  }

  /**
   * Detaches and returns the tail.
   * @throws InvalidStateError if the list is empty
   */
  removeLast(): RecencyNode<K> {
    const node = this.tail;
    if (!node) {
      throw new InvalidStateError('List empty');
    }
    this.remove(node);
    return node;
  }

  /**
   * Walks head to tail at call time. Do not mutate the list while consuming.
   */
  *keys(): Generator<K, void, undefined> {
    let current = this.head;
    while (current) {
      yield current.key;
      current = current.next;
    }
  }

  [Symbol.iterator](): Generator<K, void, undefined> {
    return this.keys();
  }
}
