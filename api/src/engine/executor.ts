import {
  COMMITTED,
  INVARIANT_VIOLATION,
  PRECONDITION_VIOLATION,
  Committed,
  InvariantFailure,
  OperationResult,
  ReentrantOperationError,
  UnknownOperationError,
} from './errors';
import { describeHandle, Handle } from './handles';
import { InvariantSet } from './invariants';
import type { Restore, Store, StoreState } from './store';

/** One named clause of an operation's precondition. */
export interface Requirement<S, A extends unknown[]> {
  readonly description: string;
  readonly relation: string;
  holds(state: S, ...args: A): boolean;
}

export interface OperationDefinition<S, A extends unknown[]> {
  readonly requires: ReadonlyArray<Requirement<S, A>>;
  effect(state: S, ...args: A): void;
}

export type OperationSignatures<O> = {
  [K in keyof O]: (...args: never[]) => void;
};

export type OperationDefinitions<S, O extends OperationSignatures<O>> = {
  [K in keyof O]: OperationDefinition<S, Parameters<O[K]>>;
};

export interface CommittedOperation {
  operation: string;
  args: string[];
}

export type OperationListener = (committed: CommittedOperation) => void;

type Phase =
  | { step: 'idle' }
  | { step: 'precondition' | 'effect' | 'invariants'; operation: string };

const IDLE: Phase = { step: 'idle' };

const isHandle = (value: unknown): value is Handle =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  'id' in value &&
  typeof value.kind === 'string' &&
  typeof value.id === 'number';

export const describeArgument = (value: unknown): string => {
  if (isHandle(value)) return describeHandle(value);
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
};

/**
 * The single mutation path of a store. Each apply checks the precondition
 * against the pre-state, runs the effect, then runs every invariant against
 * the result and restores the pre-state if any of them fails.
 */
export class OperationExecutor<
  S extends StoreState,
  O extends OperationSignatures<O>,
> {
  private phase: Phase = IDLE;
  private readonly listeners = new Set<OperationListener>();

  constructor(
    private readonly store: Store<S>,
    private readonly operations: OperationDefinitions<S, O>,
    private readonly invariants: InvariantSet<S>,
    private readonly describe: (value: unknown) => string = describeArgument
  ) {}

  public apply<K extends keyof O & string>(
    name: K,
    ...args: Parameters<O[K]>
  ): OperationResult {
    this.assertIdle(name);
    const operation = this.operations[name];
    if (!operation) {
      throw new UnknownOperationError(name);
    }

    const state = this.store.state;
    const described = args.map((arg) => this.describe(arg));
    let restore: Restore | undefined;

    try {
      this.phase = { step: 'precondition', operation: name };
      for (const requirement of operation.requires) {
        if (!requirement.holds(state, ...args)) {
          return {
            error: PRECONDITION_VIOLATION,
            operation: name,
            requirement: requirement.description,
            relation: requirement.relation,
            args: described,
          };
        }
      }

      restore = this.store.checkpoint();
      this.phase = { step: 'effect', operation: name };
      operation.effect(state, ...args);

      this.phase = { step: 'invariants', operation: name };
      const violations = this.invariants.checkAll(state);
      if (violations.length > 0) {
        restore();
        restore = undefined;
        return {
          error: INVARIANT_VIOLATION,
          operation: name,
          violations,
          args: described,
        };
      }
      restore = undefined;
    } catch (error) {
      if (restore) restore();
      throw error;
    } finally {
      this.phase = IDLE;
    }

    this.notify({ operation: name, args: described });
    return COMMITTED;
  }

  /**
   * Swaps the whole state for whatever `load` builds on an empty store. The
   * new state is kept only if every invariant holds on it.
   */
  public replace(load: (state: S) => void): Committed | InvariantFailure {
    const operation = 'replace';
    this.assertIdle(operation);
    const restore = this.store.checkpoint();

    try {
      this.phase = { step: 'effect', operation };
      this.store.clear();
      load(this.store.state);

      this.phase = { step: 'invariants', operation };
      const violations = this.invariants.checkAll(this.store.state);
      if (violations.length > 0) {
        restore();
        return { error: INVARIANT_VIOLATION, operation, violations, args: [] };
      }
    } catch (error) {
      restore();
      throw error;
    } finally {
      this.phase = IDLE;
    }

    this.notify({ operation, args: [] });
    return COMMITTED;
  }

  /** Throws when a read is attempted from inside an effect. */
  public assertReadable(reader: string): void {
    if (this.phase.step === 'effect') {
      throw new ReentrantOperationError(reader, this.phase.operation);
    }
  }

  public isIdle(): boolean {
    return this.phase.step === 'idle';
  }

  public subscribe(listener: OperationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private assertIdle(attempted: string): void {
    if (this.phase.step !== 'idle') {
      throw new ReentrantOperationError(attempted, this.phase.operation);
    }
  }

  // The commit stands whatever a listener does.
  private notify(committed: CommittedOperation): void {
    for (const listener of this.listeners) {
      try {
        listener(committed);
      } catch (error) {
        console.error(`Operation listener failed after ${committed.operation}:`, error);
      }
    }
  }
}
