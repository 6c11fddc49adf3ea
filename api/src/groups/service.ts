import db from '../db';
import { COMMITTED, OperationFailure, OperationResult } from '../engine/errors';
import { from } from '../engine/comprehension';
import { RosterEngine } from '../roster/engine';
import type { GroupHandle, UserHandle } from '../roster/roster';
import { UserNotFoundError, UserService, USER_NOT_FOUND } from '../users/service';
import { CreateGroupRequest, GroupView, UpdateGroupRequest } from './groups';

export type GroupNotFoundError = 'GROUP_NOT_FOUND';
export const GROUP_NOT_FOUND: GroupNotFoundError = 'GROUP_NOT_FOUND';

type PairOperation =
  | 'addMember'
  | 'rmMember'
  | 'addAdmin'
  | 'rmAdmin';

const sortedNames = (names: string[]): string[] =>
  [...names].sort((a, b) => a.localeCompare(b));

export class GroupService {
  private readonly users: UserService;

  constructor(private readonly engine: RosterEngine = db) {
    this.users = new UserService(engine);
  }

  public getAllGroups(): GroupView[] {
    return from(this.engine.state.groups)
      .distinct()
      .select((group) => this.toGroupView(group))
      .toArray((a, b) => a.name.localeCompare(b.name));
  }

  public lookup(name: string): GroupHandle | GroupNotFoundError {
    const key = name.trim();
    if (!this.engine.query('hasGroup', key)) {
      return GROUP_NOT_FOUND;
    }
    return this.engine.query('findGroup', key);
  }

  public getGroupByName(name: string): GroupView | GroupNotFoundError {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }
    return this.toGroupView(group);
  }

  public createGroup(request: CreateGroupRequest): GroupView | OperationFailure {
    const name = request.name.trim();
    const group = this.engine.newGroup({
      name,
      displayName: request.displayName?.trim() || name,
      description: request.description ?? '',
      rosterMode: request.rosterMode ?? 'NOBODY',
    });

    const result = this.engine.apply('addGroup', group);
    if (result !== COMMITTED) {
      this.engine.dispose(group);
      return result;
    }

    return this.toGroupView(group);
  }

  public updateGroup(
    name: string,
    request: UpdateGroupRequest
  ): GroupView | GroupNotFoundError | OperationFailure {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }

    // The mode goes first: it is the only field change that can be refused.
    const steps: Array<() => OperationResult> = [];
    if (request.rosterMode !== undefined) {
      const mode = request.rosterMode;
      steps.push(() => this.engine.apply('setMode', group, mode));
    }
    if (request.displayName !== undefined) {
      const displayName = request.displayName.trim();
      steps.push(() =>
        this.engine.apply('setGroupDisplayName', group, displayName)
      );
    }
    if (request.description !== undefined) {
      const description = request.description;
      steps.push(() =>
        this.engine.apply('setGroupDescription', group, description)
      );
    }

    for (const step of steps) {
      const result = step();
      if (result !== COMMITTED) {
        return result;
      }
    }

    return this.toGroupView(group);
  }

  public deleteGroup(
    name: string
  ): void | GroupNotFoundError | OperationFailure {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }

    const result = this.engine.apply('rmGroup', group);
    if (result !== COMMITTED) {
      return result;
    }

    this.engine.dispose(group);
  }

  public addMember(name: string, username: string) {
    return this.applyToPair('addMember', name, username);
  }

  public removeMember(name: string, username: string) {
    return this.applyToPair('rmMember', name, username);
  }

  public addAdmin(name: string, username: string) {
    return this.applyToPair('addAdmin', name, username);
  }

  public removeAdmin(name: string, username: string) {
    return this.applyToPair('rmAdmin', name, username);
  }

  public addChildGroup(
    name: string,
    childName: string
  ): GroupView | GroupNotFoundError | OperationFailure {
    return this.applyToGroups('addSharedGroup', name, childName);
  }

  public removeChildGroup(
    name: string,
    childName: string
  ): GroupView | GroupNotFoundError | OperationFailure {
    return this.applyToGroups('rmSharedGroup', name, childName);
  }

  public getWatchers(name: string): string[] | GroupNotFoundError {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }
    return sortedNames(
      this.engine
        .query('usersWatchingGroup', group)
        .map((user) => this.engine.user(user).username)
    );
  }

  public isVisibleTo(
    name: string,
    username: string
  ): boolean | GroupNotFoundError | UserNotFoundError {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }
    const user = this.users.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    return this.engine.query('groupIsVisible', group, user);
  }

  private applyToPair(
    operation: PairOperation,
    name: string,
    username: string
  ): GroupView | GroupNotFoundError | UserNotFoundError | OperationFailure {
    const group = this.lookup(name);
    if (group === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }
    const user: UserHandle | UserNotFoundError = this.users.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }

    const result = this.engine.apply(operation, group, user);
    if (result !== COMMITTED) {
      return result;
    }
    return this.toGroupView(group);
  }

  private applyToGroups(
    operation: 'addSharedGroup' | 'rmSharedGroup',
    name: string,
    childName: string
  ): GroupView | GroupNotFoundError | OperationFailure {
    const group = this.lookup(name);
    const child = this.lookup(childName);
    if (group === GROUP_NOT_FOUND || child === GROUP_NOT_FOUND) {
      return GROUP_NOT_FOUND;
    }

    const result = this.engine.apply(operation, group, child);
    if (result !== COMMITTED) {
      return result;
    }
    return this.toGroupView(group);
  }

  private toGroupView(group: GroupHandle): GroupView {
    const { name, displayName, description, rosterMode } =
      this.engine.group(group);
    const username = (user: UserHandle) => this.engine.user(user).username;
    return {
      name,
      displayName,
      description,
      rosterMode,
      members: sortedNames(this.engine.query('membersOf', group).map(username)),
      admins: sortedNames(this.engine.query('adminsOf', group).map(username)),
      childGroups: sortedNames(
        this.engine
          .query('childGroupsOf', group)
          .map((child) => this.engine.group(child).name)
      ),
    };
  }
}
