import { IntegrityViolationError } from './errors';

/**
 * Lazy filter/map/join pipeline over any iterable. Nothing is evaluated
 * until a terminal method (`exists`, `count`, `toArray`, ...) runs.
 */
export class Comprehension<T> implements Iterable<T> {
  constructor(private readonly source: () => Iterable<T>) {}

  public [Symbol.iterator](): Iterator<T> {
    return this.source()[Symbol.iterator]();
  }

  public where(predicate: (item: T) => boolean): Comprehension<T> {
    return new Comprehension(() => filter(this, predicate));
  }

  public select<R>(project: (item: T) => R): Comprehension<R> {
    return new Comprehension(() => map(this, project));
  }

  public selectMany<R>(expand: (item: T) => Iterable<R>): Comprehension<R> {
    return new Comprehension(() => flatMap(this, expand));
  }

  /** Drops repeated items, compared by identity. */
  public distinct(): Comprehension<T> {
    return new Comprehension(() => new Set(this));
  }

  public exists(predicate: (item: T) => boolean = () => true): boolean {
    for (const item of this) {
      if (predicate(item)) return true;
    }
    return false;
  }

  public forAll(predicate: (item: T) => boolean): boolean {
    for (const item of this) {
      if (!predicate(item)) return false;
    }
    return true;
  }

  public count(): number {
    let total = 0;
    for (const _item of this) total += 1;
    return total;
  }

  public sum(value: (item: T) => number): number {
    let total = 0;
    for (const item of this) total += value(item);
    return total;
  }

  /** The single item; zero or several is an integrity error. */
  public unique(relation: string, description: string): T {
    const [first, second] = this.take(2);
    if (first === undefined || second !== undefined) {
      throw new IntegrityViolationError(relation, this.count(), description);
    }
    return first.item;
  }

  /** The item if there is one; several is an integrity error. */
  public atMostOne(relation: string, description: string): T | undefined {
    const [first, second] = this.take(2);
    if (second !== undefined) {
      throw new IntegrityViolationError(relation, this.count(), description);
    }
    return first?.item;
  }

  public toArray(compare?: (a: T, b: T) => number): T[] {
    const items = [...this];
    return compare ? items.sort(compare) : items;
  }

  private take(limit: number): { item: T }[] {
    const taken: { item: T }[] = [];
    for (const item of this) {
      taken.push({ item });
      if (taken.length >= limit) break;
    }
    return taken;
  }
}

function* filter<T>(
  items: Iterable<T>,
  predicate: (item: T) => boolean
): Generator<T> {
  for (const item of items) {
    if (predicate(item)) yield item;
  }
}

function* map<T, R>(items: Iterable<T>, project: (item: T) => R): Generator<R> {
  for (const item of items) yield project(item);
}

function* flatMap<T, R>(
  items: Iterable<T>,
  expand: (item: T) => Iterable<R>
): Generator<R> {
  for (const item of items) yield* expand(item);
}

export const from = <T>(source: Iterable<T>): Comprehension<T> =>
  new Comprehension(() => source);
