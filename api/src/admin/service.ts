import db from '../db';
import type { Committed, InvariantFailure } from '../engine/errors';
import { RosterEngine } from '../roster/engine';
import type { GroupHandle, UserHandle } from '../roster/roster';
import type { RosterState } from '../roster/state';
import { normalizeUsername } from '../users/service';
import { InvariantReport, RosterSnapshot } from './admin';

export class AdminService {
  constructor(private readonly engine: RosterEngine = db) {}

  public exportSnapshot(): RosterSnapshot {
    const { state } = this.engine;
    const username = (user: UserHandle) => state.userCells.get(user).username;
    const groupName = (group: GroupHandle) => state.groupCells.get(group).name;

    return {
      users: [...state.users].map((user) => {
        const value = state.userCells.get(user);
        return {
          username: value.username,
          password: value.password,
          displayName: value.displayName,
          email: value.email,
          createdAt: value.createdAt.toISOString(),
          updatedAt: value.updatedAt.toISOString(),
        };
      }),
      rosterItems: [...state.rosterItems].map((item) => ({
        ...state.rosterItemCells.get(item),
      })),
      groups: [...state.groups].map((group) => ({
        ...state.groupCells.get(group),
      })),
      childGroups: [...state.childGroups].map(([parent, child]) => ({
        parent: groupName(parent),
        child: groupName(child),
      })),
      groupMembers: [...state.groupMembers].map(([group, user]) => ({
        group: groupName(group),
        username: username(user),
      })),
      admins: [...state.admins].map(([group, user]) => ({
        group: groupName(group),
        username: username(user),
      })),
    };
  }

  /**
   * Replaces the live store with `snapshot` if the result satisfies every
   * invariant. Names are put in the form the services look them up by, so
   * `Alice` and `alice` collide on the unique-username invariant. A pair
   * naming an entity the snapshot does not contain is bound to a detached
   * handle, so the referential invariants reject it.
   */
  public importSnapshot(
    snapshot: RosterSnapshot
  ): Committed | InvariantFailure {
    return this.engine.replace((state) => {
      const users = new Map<string, UserHandle>();
      const groups = new Map<string, GroupHandle>();

      for (const user of snapshot.users) {
        const username = normalizeUsername(user.username);
        const handle = state.userCells.create({
          ...user,
          username,
          createdAt: new Date(user.createdAt),
          updatedAt: new Date(user.updatedAt),
        });
        state.users.add(handle);
        users.set(username, handle);
      }
      for (const item of snapshot.rosterItems) {
        state.rosterItems.add(
          state.rosterItemCells.create({
            ...item,
            username: normalizeUsername(item.username),
          })
        );
      }
      for (const group of snapshot.groups) {
        const name = group.name.trim();
        const handle = state.groupCells.create({ ...group, name });
        state.groups.add(handle);
        groups.set(name, handle);
      }

      const userNamed = (name: string) => {
        const username = normalizeUsername(name);
        return users.get(username) ?? detachedUser(state, username);
      };
      const groupNamed = (name: string) => {
        const trimmed = name.trim();
        return groups.get(trimmed) ?? detachedGroup(state, trimmed);
      };

      for (const { parent, child } of snapshot.childGroups) {
        state.childGroups.add(groupNamed(parent), groupNamed(child));
      }
      for (const { group, username } of snapshot.groupMembers) {
        state.groupMembers.add(groupNamed(group), userNamed(username));
      }
      for (const { group, username } of snapshot.admins) {
        state.admins.add(groupNamed(group), userNamed(username));
      }
    });
  }

  public checkInvariants(): InvariantReport {
    const violations = this.engine.checkInvariants();
    return {
      holds: violations.length === 0,
      invariants: this.engine.invariantNames(),
      violations,
    };
  }
}

const detachedUser = (state: RosterState, username: string): UserHandle =>
  state.userCells.create({
    username,
    password: '',
    displayName: username,
    email: '',
    createdAt: new Date(0),
    updatedAt: new Date(0),
  });

const detachedGroup = (state: RosterState, name: string): GroupHandle =>
  state.groupCells.create({
    name,
    displayName: name,
    description: '',
    rosterMode: 'NOBODY',
  });
