import type {
  Committed,
  InvariantFailure,
  InvariantViolation,
  OperationResult,
} from '../engine/errors';
import {
  describeArgument,
  OperationExecutor,
  OperationListener,
} from '../engine/executor';
import { InvariantSet } from '../engine/invariants';
import { QueryEvaluator } from '../engine/queries';
import { Store } from '../engine/store';
import { createRosterInvariants } from './invariants';
import { createRosterOperations, RosterOperations } from './operations';
import { createRosterQueries, RosterQueries } from './queries';
import {
  defaultHost,
  Group,
  GroupHandle,
  RosterHost,
  RosterItem,
  RosterItemHandle,
  User,
  UserHandle,
} from './roster';
import { createRosterState, RosterState } from './state';

/**
 * The roster model wired onto the generic engine: one store, one executor
 * guarding it and one query evaluator reading it.
 */
export class RosterEngine {
  public readonly state: RosterState = createRosterState();
  public readonly host: RosterHost;
  private readonly store = new Store(this.state);
  private readonly invariants: InvariantSet<RosterState>;
  private readonly executor: OperationExecutor<RosterState, RosterOperations>;
  private readonly evaluator: QueryEvaluator<RosterState, RosterQueries>;
  private lastRosterItemId = 0;

  constructor(host: RosterHost = defaultHost) {
    this.host = host;
    this.invariants = createRosterInvariants(host);
    this.executor = new OperationExecutor<RosterState, RosterOperations>(
      this.store,
      createRosterOperations(host),
      this.invariants,
      (value) => this.describe(value)
    );
    this.evaluator = new QueryEvaluator<RosterState, RosterQueries>(
      this.state,
      createRosterQueries(host),
      this.executor
    );
  }

  public apply<K extends keyof RosterOperations>(
    name: K,
    ...args: Parameters<RosterOperations[K]>
  ): OperationResult {
    return this.executor.apply(name, ...args);
  }

  public query<K extends keyof RosterQueries>(
    name: K,
    ...args: Parameters<RosterQueries[K]>
  ): ReturnType<RosterQueries[K]> {
    return this.evaluator.run(name, ...args);
  }

  public newUser(value: User): UserHandle {
    return this.state.userCells.create(value);
  }

  public newRosterItem(value: RosterItem): RosterItemHandle {
    return this.state.rosterItemCells.create(value);
  }

  public newGroup(value: Group): GroupHandle {
    return this.state.groupCells.create(value);
  }

  /**
   * Ids only go up, past every id handed out before and every id in the
   * store, so a removed item's id is never given to a new one.
   */
  public nextRosterItemId(): number {
    for (const item of this.state.rosterItems) {
      this.lastRosterItemId = Math.max(
        this.lastRosterItemId,
        this.rosterItem(item).id
      );
    }
    this.lastRosterItemId += 1;
    return this.lastRosterItemId;
  }

  public user(handle: UserHandle): Readonly<User> {
    return this.state.userCells.get(handle);
  }

  public rosterItem(handle: RosterItemHandle): Readonly<RosterItem> {
    return this.state.rosterItemCells.get(handle);
  }

  public group(handle: GroupHandle): Readonly<Group> {
    return this.state.groupCells.get(handle);
  }

  /** Handles may only be disposed once nothing in the store refers to them. */
  public dispose(handle: UserHandle | RosterItemHandle | GroupHandle): void {
    this.executor.assertReadable('dispose');
    if (this.isReferenced(handle)) {
      throw new Error(`${describeArgument(handle)} is still referenced`);
    }
    switch (handle.kind) {
      case 'user':
        this.state.userCells.dispose(handle);
        break;
      case 'rosterItem':
        this.state.rosterItemCells.dispose(handle);
        break;
      case 'group':
        this.state.groupCells.dispose(handle);
        break;
    }
  }

  public checkInvariants(): InvariantViolation[] {
    return this.invariants.checkAll(this.state);
  }

  public invariantNames(): string[] {
    return this.invariants.names();
  }

  public replace(
    load: (state: RosterState) => void
  ): Committed | InvariantFailure {
    return this.executor.replace(load);
  }

  public subscribe(listener: OperationListener): () => void {
    return this.executor.subscribe(listener);
  }

  private isReferenced(
    handle: UserHandle | RosterItemHandle | GroupHandle
  ): boolean {
    const { state } = this;
    switch (handle.kind) {
      case 'user':
        return (
          state.users.contains(handle) ||
          state.groupMembers.involves(handle) ||
          state.admins.involves(handle)
        );
      case 'rosterItem':
        return state.rosterItems.contains(handle);
      case 'group':
        return (
          state.groups.contains(handle) ||
          state.childGroups.involves(handle) ||
          state.groupMembers.involves(handle) ||
          state.admins.involves(handle)
        );
    }
  }

  private describe(value: unknown): string {
    const base = describeArgument(value);
    if (!isRosterHandle(value)) return base;
    switch (value.kind) {
      case 'user':
        return this.state.userCells.isAlive(value)
          ? `${base}(${this.state.userCells.get(value).username})`
          : base;
      case 'rosterItem':
        return this.state.rosterItemCells.isAlive(value)
          ? `${base}(${this.state.rosterItemCells.get(value).id})`
          : base;
      case 'group':
        return this.state.groupCells.isAlive(value)
          ? `${base}(${this.state.groupCells.get(value).name})`
          : base;
    }
  }
}

const isRosterHandle = (
  value: unknown
): value is UserHandle | RosterItemHandle | GroupHandle =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  (value.kind === 'user' ||
    value.kind === 'rosterItem' ||
    value.kind === 'group');
