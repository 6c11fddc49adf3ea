export type PreconditionViolationError = 'PRECONDITION_VIOLATION';
export const PRECONDITION_VIOLATION: PreconditionViolationError =
  'PRECONDITION_VIOLATION';
export type InvariantViolationError = 'INVARIANT_VIOLATION';
export const INVARIANT_VIOLATION: InvariantViolationError =
  'INVARIANT_VIOLATION';
export type Committed = 'COMMITTED';
export const COMMITTED: Committed = 'COMMITTED';

export interface InvariantViolation {
  invariant: string;
  relation: string;
  message: string;
}

export interface PreconditionFailure {
  error: PreconditionViolationError;
  operation: string;
  requirement: string;
  relation: string;
  args: string[];
}

export interface InvariantFailure {
  error: InvariantViolationError;
  operation: string;
  violations: InvariantViolation[];
  args: string[];
}

export type OperationFailure = PreconditionFailure | InvariantFailure;

export type OperationResult = Committed | OperationFailure;

export const isOperationFailure = (value: unknown): value is OperationFailure =>
  typeof value === 'object' &&
  value !== null &&
  'error' in value &&
  (value.error === PRECONDITION_VIOLATION ||
    value.error === INVARIANT_VIOLATION);

export const describeFailure = (failure: OperationFailure): string => {
  if (failure.error === PRECONDITION_VIOLATION) {
    return `${failure.operation}(${failure.args.join(', ')}): requires ${failure.requirement} [${failure.relation}]`;
  }
  const broken = failure.violations
    .map((v) => `${v.invariant} [${v.relation}]: ${v.message}`)
    .join('; ');
  return `${failure.operation}(${failure.args.join(', ')}) would break ${broken}`;
};

export class EngineError extends Error {
  public readonly status: number = 500;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class IntegrityViolationError extends EngineError {
  constructor(
    public readonly relation: string,
    public readonly matches: number,
    description: string
  ) {
    super(
      `Expected ${matches === 0 ? 'one' : 'at most one'} match in ${relation} for ${description}, found ${matches}`
    );
  }
}

export class HandleDisposedError extends EngineError {
  constructor(kind: string, id: number) {
    super(`${kind}#${id} has been disposed`);
  }
}

export class ForeignHandleError extends EngineError {
  constructor(kind: string, id: number, expected: string) {
    super(`${kind}#${id} was not issued by the ${expected} store`);
  }
}

export class ReentrantOperationError extends EngineError {
  constructor(attempted: string, running: string) {
    super(`Cannot run ${attempted} while ${running} is in progress`);
  }
}

export class UnknownOperationError extends EngineError {
  public readonly status = 404;

  constructor(name: string) {
    super(`Unknown operation: ${name}`);
  }
}

export class UnknownQueryError extends EngineError {
  constructor(name: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Query ${referencedBy} depends on unknown query ${name}`
        : `Unknown query: ${name}`
    );
  }
}

export class QueryCycleError extends EngineError {
  constructor(public readonly cycle: string[]) {
    super(`Query dependency cycle: ${cycle.join(' -> ')}`);
  }
}

export class UndeclaredDependencyError extends EngineError {
  constructor(caller: string, callee: string) {
    super(`Query ${caller} called ${callee} without declaring it in dependsOn`);
  }
}
