import type { Handle } from './handles';
import type { InvariantViolation } from './errors';

/**
 * A closed predicate over the whole model state. `check` returns a message
 * for every offending element, so an empty list means the invariant holds.
 */
export interface Invariant<S> {
  readonly name: string;
  readonly relation: string;
  readonly description: string;
  check(state: S): string[];
}

export class InvariantSet<S> {
  private readonly invariants: Invariant<S>[] = [];

  constructor(invariants: Invariant<S>[] = []) {
    for (const invariant of invariants) this.register(invariant);
  }

  public register(invariant: Invariant<S>): void {
    if (this.invariants.some((i) => i.name === invariant.name)) {
      throw new Error(`Invariant "${invariant.name}" is already registered`);
    }
    this.invariants.push(invariant);
  }

  public checkAll(state: S): InvariantViolation[] {
    return this.invariants.flatMap((invariant) =>
      invariant.check(state).map((message) => ({
        invariant: invariant.name,
        relation: invariant.relation,
        message,
      }))
    );
  }

  public firstViolation(state: S): InvariantViolation | undefined {
    for (const invariant of this.invariants) {
      const [message] = invariant.check(state);
      if (message !== undefined) {
        return { invariant: invariant.name, relation: invariant.relation, message };
      }
    }
    return undefined;
  }

  public holds(state: S): boolean {
    return this.firstViolation(state) === undefined;
  }

  public names(): string[] {
    return this.invariants.map((i) => i.name);
  }
}

/** No two elements of `elements(state)` share a key. */
export const uniqueBy = <S, E>(
  name: string,
  relation: string,
  elements: (state: S) => Iterable<E>,
  key: (element: E, state: S) => string
): Invariant<S> => ({
  name,
  relation,
  description: `${relation} elements are unique by key`,
  check: (state) => {
    const seen = new Map<string, number>();
    for (const element of elements(state)) {
      const k = key(element, state);
      seen.set(k, (seen.get(k) ?? 0) + 1);
    }
    return [...seen]
      .filter(([, count]) => count > 1)
      .map(([k, count]) => `key "${k}" appears ${count} times`);
  },
});

/** Every handle on the given side of each pair is present in its population. */
export const referencesPresent = <S, A extends Handle, B extends Handle>(
  name: string,
  relation: string,
  pairs: (state: S) => Iterable<readonly [A, B]>,
  present: {
    left?: (state: S, handle: A) => boolean;
    right?: (state: S, handle: B) => boolean;
  }
): Invariant<S> => ({
  name,
  relation,
  description: `${relation} only references live entities`,
  check: (state) => {
    const dangling: string[] = [];
    for (const [left, right] of pairs(state)) {
      if (present.left && !present.left(state, left)) {
        dangling.push(`${left.kind}#${left.id} is not present`);
      }
      if (present.right && !present.right(state, right)) {
        dangling.push(`${right.kind}#${right.id} is not present`);
      }
    }
    return dangling;
  },
});
