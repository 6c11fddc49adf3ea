import {
  QueryCycleError,
  UndeclaredDependencyError,
  UnknownQueryError,
} from './errors';

export type QuerySignatures<Q> = {
  [K in keyof Q]: (...args: never[]) => unknown;
};

export type QueryName<Q> = keyof Q & string;

export interface QueryContext<S, Q extends QuerySignatures<Q>> {
  readonly state: S;
  call<K extends QueryName<Q>>(
    name: K,
    ...args: Parameters<Q[K]>
  ): ReturnType<Q[K]>;
}

export interface QueryDefinition<
  S,
  Q extends QuerySignatures<Q>,
  A extends unknown[],
  R,
> {
  /** Queries this one may call through its context. */
  readonly dependsOn: ReadonlyArray<QueryName<Q>>;
  evaluate(ctx: QueryContext<S, Q>, ...args: A): R;
}

export type QueryDefinitions<S, Q extends QuerySignatures<Q>> = {
  [K in keyof Q]: QueryDefinition<S, Q, Parameters<Q[K]>, ReturnType<Q[K]>>;
};

export interface ReadGuard {
  assertReadable(reader: string): void;
}

class EvaluationContext<S, Q extends QuerySignatures<Q>>
  implements QueryContext<S, Q>
{
  constructor(
    private readonly evaluator: QueryEvaluator<S, Q>,
    private readonly caller: QueryName<Q>,
    private readonly allowed: ReadonlyArray<QueryName<Q>>
  ) {}

  public get state(): S {
    return this.evaluator.state;
  }

  public call<K extends QueryName<Q>>(
    name: K,
    ...args: Parameters<Q[K]>
  ): ReturnType<Q[K]> {
    if (!this.allowed.includes(name)) {
      throw new UndeclaredDependencyError(this.caller, name);
    }
    return this.evaluator.evaluate(name, args);
  }
}

/**
 * Runs named read-only queries against the live state. The dependency graph
 * declared through `dependsOn` is checked for cycles up front, so nested
 * calls always terminate. Nothing is cached between calls.
 */
export class QueryEvaluator<S, Q extends QuerySignatures<Q>> {
  constructor(
    public readonly state: S,
    private readonly queries: QueryDefinitions<S, Q>,
    private readonly guard?: ReadGuard
  ) {
    assertAcyclic(queries);
  }

  public run<K extends QueryName<Q>>(
    name: K,
    ...args: Parameters<Q[K]>
  ): ReturnType<Q[K]> {
    this.guard?.assertReadable(name);
    return this.evaluate(name, args);
  }

  public evaluate<K extends QueryName<Q>>(
    name: K,
    args: Parameters<Q[K]>
  ): ReturnType<Q[K]> {
    const definition = this.queries[name];
    if (!definition) {
      throw new UnknownQueryError(name);
    }
    const ctx = new EvaluationContext<S, Q>(this, name, definition.dependsOn);
    return definition.evaluate(ctx, ...args);
  }
}

const queryNames = <S, Q extends QuerySignatures<Q>>(
  queries: QueryDefinitions<S, Q>
): QueryName<Q>[] =>
  Object.keys(queries).filter((name): name is QueryName<Q> => name in queries);

/** Throws on unknown dependencies and on any dependency cycle. */
export const assertAcyclic = <S, Q extends QuerySignatures<Q>>(
  queries: QueryDefinitions<S, Q>
): void => {
  const names = queryNames(queries);
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: QueryName<Q>): void => {
    if (done.has(name)) return;
    const start = path.indexOf(name);
    if (start >= 0) {
      throw new QueryCycleError([...path.slice(start), name]);
    }
    path.push(name);
    for (const dependency of queries[name].dependsOn) {
      if (!names.includes(dependency)) {
        throw new UnknownQueryError(dependency, name);
      }
      visit(dependency);
    }
    path.pop();
    done.add(name);
  };

  for (const name of names) visit(name);
};
