import type { OperationDefinitions, Requirement } from '../engine/executor';
import { from } from '../engine/comprehension';
import type {
  AskStatus,
  GroupHandle,
  RecvStatus,
  RosterHost,
  RosterItemHandle,
  RosterMode,
  UserHandle,
} from './roster';
import { groupOf, rosterItemOf, RosterState, userOf } from './state';

export interface RosterOperations {
  addUser: (user: UserHandle) => void;
  rmUser: (user: UserHandle) => void;
  setUserDisplayName: (user: UserHandle, displayName: string, at: Date) => void;
  setUserPassword: (user: UserHandle, password: string, at: Date) => void;
  setUserEmail: (user: UserHandle, email: string, at: Date) => void;
  addRosterItem: (item: RosterItemHandle) => void;
  rmRosterItem: (item: RosterItemHandle) => void;
  setAskStatus: (item: RosterItemHandle, askStatus: AskStatus) => void;
  setRecvStatus: (item: RosterItemHandle, recvStatus: RecvStatus) => void;
  setNickname: (item: RosterItemHandle, nickname: string | null) => void;
  addGroup: (group: GroupHandle) => void;
  rmGroup: (group: GroupHandle) => void;
  setGroupDisplayName: (group: GroupHandle, displayName: string) => void;
  setGroupDescription: (group: GroupHandle, description: string) => void;
  setMode: (group: GroupHandle, mode: RosterMode) => void;
  addMember: (group: GroupHandle, user: UserHandle) => void;
  rmMember: (group: GroupHandle, user: UserHandle) => void;
  addAdmin: (group: GroupHandle, user: UserHandle) => void;
  rmAdmin: (group: GroupHandle, user: UserHandle) => void;
  addSharedGroup: (group: GroupHandle, child: GroupHandle) => void;
  rmSharedGroup: (group: GroupHandle, child: GroupHandle) => void;
}

export type RosterOperationName = keyof RosterOperations;

const requirement = <A extends unknown[]>(
  relation: string,
  description: string,
  holds: (state: RosterState, ...args: A) => boolean
): Requirement<RosterState, A> => ({ relation, description, holds });

const userPresent = requirement(
  'users',
  'user is present',
  (state: RosterState, user: UserHandle) => state.users.contains(user)
);

const groupPresent = requirement(
  'groups',
  'group is present',
  (state: RosterState, group: GroupHandle) => state.groups.contains(group)
);

const pairAbsent = (
  relation: 'groupMembers' | 'admins',
  description: string
) => [
  requirement(
    'groups',
    'group is present',
    (state: RosterState, group: GroupHandle, _user: UserHandle) =>
      state.groups.contains(group)
  ),
  requirement(
    'users',
    'user is present',
    (state: RosterState, _group: GroupHandle, user: UserHandle) =>
      state.users.contains(user)
  ),
  requirement(
    relation,
    description,
    (state: RosterState, group: GroupHandle, user: UserHandle) =>
      !state[relation].contains(group, user)
  ),
];

export const createRosterOperations = (
  host: RosterHost
): OperationDefinitions<RosterState, RosterOperations> => ({
  addUser: {
    requires: [
      requirement(
        'users',
        'no existing user has the same username',
        (state: RosterState, user: UserHandle) => {
          const { username } = userOf(state, user);
          return !from(state.users).exists(
            (u) => userOf(state, u).username === username
          );
        }
      ),
    ],
    effect: (state, user) => state.users.add(user),
  },

  rmUser: {
    requires: [
      userPresent,
      requirement(
        'groupMembers',
        'user is a member of no group',
        (state: RosterState, user: UserHandle) =>
          !from(state.groupMembers).exists(([, u]) => u === user)
      ),
      requirement(
        'admins',
        'user administers no group',
        (state: RosterState, user: UserHandle) =>
          !from(state.admins).exists(([, u]) => u === user)
      ),
    ],
    effect: (state, user) => {
      state.users.remove(user);
    },
  },

  setUserDisplayName: {
    requires: [],
    effect: (state, user, displayName, at) =>
      state.userCells.mutate(user, (u) => ({ ...u, displayName, updatedAt: at })),
  },

  setUserPassword: {
    requires: [],
    effect: (state, user, password, at) =>
      state.userCells.mutate(user, (u) => ({ ...u, password, updatedAt: at })),
  },

  setUserEmail: {
    requires: [],
    effect: (state, user, email, at) =>
      state.userCells.mutate(user, (u) => ({ ...u, email, updatedAt: at })),
  },

  addRosterItem: {
    requires: [
      requirement(
        'rosterItems',
        'no existing roster item has the same id',
        (state: RosterState, item: RosterItemHandle) => {
          const { id } = rosterItemOf(state, item);
          return !from(state.rosterItems).exists(
            (e) => rosterItemOf(state, e).id === id
          );
        }
      ),
      requirement(
        'rosterItems',
        'owner has no roster item for the same contact',
        (state: RosterState, item: RosterItemHandle) => {
          const { username, jid } = rosterItemOf(state, item);
          const target = host.resolveUsername(jid);
          return !from(state.rosterItems).exists((e) => {
            const other = rosterItemOf(state, e);
            return (
              other.username === username &&
              host.resolveUsername(other.jid) === target
            );
          });
        }
      ),
    ],
    effect: (state, item) => state.rosterItems.add(item),
  },

  rmRosterItem: {
    requires: [
      requirement(
        'rosterItems',
        'roster item is present',
        (state: RosterState, item: RosterItemHandle) => state.rosterItems.contains(item)
      ),
    ],
    effect: (state, item) => {
      state.rosterItems.remove(item);
    },
  },

  setAskStatus: {
    requires: [],
    effect: (state, item, askStatus) =>
      state.rosterItemCells.mutate(item, (e) => ({ ...e, askStatus })),
  },

  setRecvStatus: {
    requires: [],
    effect: (state, item, recvStatus) =>
      state.rosterItemCells.mutate(item, (e) => ({ ...e, recvStatus })),
  },

  setNickname: {
    requires: [],
    effect: (state, item, nickname) =>
      state.rosterItemCells.mutate(item, (e) => ({ ...e, nickname })),
  },

  addGroup: {
    requires: [
      requirement(
        'groups',
        'no existing group has the same name',
        (state: RosterState, group: GroupHandle) => {
          const { name } = groupOf(state, group);
          return !from(state.groups).exists(
            (g) => groupOf(state, g).name === name
          );
        }
      ),
    ],
    effect: (state, group) => state.groups.add(group),
  },

  rmGroup: {
    requires: [
      groupPresent,
      requirement(
        'childGroups',
        'group has no parent or child groups',
        (state: RosterState, group: GroupHandle) => !state.childGroups.involves(group)
      ),
      requirement(
        'groupMembers',
        'group has no members',
        (state: RosterState, group: GroupHandle) => !state.groupMembers.involves(group)
      ),
      requirement(
        'admins',
        'group has no admins',
        (state: RosterState, group: GroupHandle) => !state.admins.involves(group)
      ),
    ],
    effect: (state, group) => {
      state.groups.remove(group);
    },
  },

  setGroupDisplayName: {
    requires: [],
    effect: (state, group, displayName) =>
      state.groupCells.mutate(group, (g) => ({ ...g, displayName })),
  },

  setGroupDescription: {
    requires: [],
    effect: (state, group, description) =>
      state.groupCells.mutate(group, (g) => ({ ...g, description })),
  },

  setMode: {
    requires: [
      requirement(
        'childGroups',
        'a group with child groups keeps mode ONLY_GROUP',
        (state: RosterState, group: GroupHandle, mode: RosterMode) =>
          mode === 'ONLY_GROUP' || from(state.childGroups.image(group)).count() === 0
      ),
    ],
    effect: (state, group, rosterMode) =>
      state.groupCells.mutate(group, (g) => ({ ...g, rosterMode })),
  },

  addMember: {
    requires: pairAbsent('groupMembers', 'user is not already a member'),
    effect: (state, group, user) => {
      state.groupMembers.add(group, user);
    },
  },

  rmMember: {
    requires: [],
    effect: (state, group, user) => {
      state.groupMembers.remove(group, user);
    },
  },

  addAdmin: {
    requires: pairAbsent('admins', 'user is not already an admin'),
    effect: (state, group, user) => {
      state.admins.add(group, user);
    },
  },

  rmAdmin: {
    requires: [],
    effect: (state, group, user) => {
      state.admins.remove(group, user);
    },
  },

  addSharedGroup: {
    requires: [
      requirement(
        'groups',
        'parent group is present',
        (state: RosterState, group: GroupHandle, _child: GroupHandle) =>
          state.groups.contains(group)
      ),
      requirement(
        'groups',
        'child group is present',
        (state: RosterState, _group: GroupHandle, child: GroupHandle) =>
          state.groups.contains(child)
      ),
      requirement(
        'groups',
        'parent group has mode ONLY_GROUP',
        (state: RosterState, group: GroupHandle, _child: GroupHandle) =>
          groupOf(state, group).rosterMode === 'ONLY_GROUP'
      ),
      requirement(
        'childGroups',
        'child group is not already shared with the parent',
        (state: RosterState, group: GroupHandle, child: GroupHandle) =>
          !state.childGroups.contains(group, child)
      ),
    ],
    effect: (state, group, child) => {
      state.childGroups.add(group, child);
    },
  },

  rmSharedGroup: {
    requires: [],
    effect: (state, group, child) => {
      state.childGroups.remove(group, child);
    },
  },
});
