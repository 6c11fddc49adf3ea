import type { Handle } from './handles';
import type { Checkpointable, Restore } from './store';

interface BagEntry<H extends Handle> {
  handle: H;
  count: number;
}

/** Unordered multiset of handles. */
export class Bag<H extends Handle> implements Checkpointable, Iterable<H> {
  private entries = new Map<number, BagEntry<H>>();

  constructor(public readonly name: string) {}

  public add(handle: H): void {
    const entry = this.entries.get(handle.id);
    if (entry) {
      entry.count += 1;
    } else {
      this.entries.set(handle.id, { handle, count: 1 });
    }
  }

  public remove(handle: H): boolean {
    const entry = this.entries.get(handle.id);
    if (!entry || entry.handle !== handle) return false;
    if (entry.count > 1) {
      entry.count -= 1;
    } else {
      this.entries.delete(handle.id);
    }
    return true;
  }

  public contains(handle: H): boolean {
    return this.entries.get(handle.id)?.handle === handle;
  }

  public count(handle: H): number {
    const entry = this.entries.get(handle.id);
    return entry?.handle === handle ? entry.count : 0;
  }

  public get size(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.count;
    return total;
  }

  public *[Symbol.iterator](): Iterator<H> {
    for (const { handle, count } of this.entries.values()) {
      for (let i = 0; i < count; i++) yield handle;
    }
  }

  public checkpoint(): Restore {
    const saved = new Map(
      [...this.entries].map(([id, entry]) => [id, { ...entry }] as const)
    );
    return () => {
      this.entries = new Map(
        [...saved].map(([id, entry]) => [id, { ...entry }] as const)
      );
    };
  }

  public clear(): void {
    this.entries.clear();
  }
}

const pairKey = (left: Handle, right: Handle): string =>
  `${left.id}:${right.id}`;

/** Set of (left, right) handle pairs. */
export class Relation<A extends Handle, B extends Handle>
  implements Checkpointable, Iterable<readonly [A, B]>
{
  private pairs = new Map<string, readonly [A, B]>();

  constructor(public readonly name: string) {}

  /** Returns false when the pair was already present. */
  public add(left: A, right: B): boolean {
    const key = pairKey(left, right);
    if (this.contains(left, right)) return false;
    this.pairs.set(key, Object.freeze([left, right] as const));
    return true;
  }

  public remove(left: A, right: B): boolean {
    if (!this.contains(left, right)) return false;
    return this.pairs.delete(pairKey(left, right));
  }

  public contains(left: A, right: B): boolean {
    const pair = this.pairs.get(pairKey(left, right));
    return pair !== undefined && pair[0] === left && pair[1] === right;
  }

  /** Every right-hand handle paired with `left`. */
  public *image(left: A): IterableIterator<B> {
    for (const [a, b] of this.pairs.values()) {
      if (a === left) yield b;
    }
  }

  /** Every left-hand handle paired with `right`. */
  public *preimage(right: B): IterableIterator<A> {
    for (const [a, b] of this.pairs.values()) {
      if (b === right) yield a;
    }
  }

  public involves(handle: Handle): boolean {
    for (const [a, b] of this.pairs.values()) {
      if (a === handle || b === handle) return true;
    }
    return false;
  }

  public get size(): number {
    return this.pairs.size;
  }

  public [Symbol.iterator](): Iterator<readonly [A, B]> {
    return this.pairs.values();
  }

  public checkpoint(): Restore {
    const saved = new Map(this.pairs);
    return () => {
      this.pairs = new Map(saved);
    };
  }

  public clear(): void {
    this.pairs.clear();
  }
}
