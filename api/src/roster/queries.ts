import { from } from '../engine/comprehension';
import type { QueryDefinitions } from '../engine/queries';
import type {
  GroupHandle,
  RosterHost,
  RosterItemHandle,
  RosterItemView,
  SubscriptionType,
  UserHandle,
} from './roster';
import { groupOf, rosterItemOf, RosterState, userOf } from './state';

export interface RosterQueries {
  findUser: (username: string) => UserHandle;
  findGroup: (name: string) => GroupHandle;
  hasUser: (username: string) => boolean;
  hasGroup: (name: string) => boolean;
  findRosterItem: (
    owner: UserHandle,
    target: UserHandle
  ) => RosterItemHandle | undefined;
  findRosterItemById: (id: number) => RosterItemHandle | undefined;
  inGroup: (group: GroupHandle, user: UserHandle) => boolean;
  isAdmin: (group: GroupHandle, user: UserHandle) => boolean;
  groupIsVisible: (group: GroupHandle, user: UserHandle) => boolean;
  sharedGroups: (viewer: UserHandle, contact: UserHandle) => GroupHandle[];
  hasSharedGroups: (viewer: UserHandle, contact: UserHandle) => boolean;
  hasSubscriptionTo: (subscriber: UserHandle, contact: UserHandle) => boolean;
  usersWatchingGroup: (group: GroupHandle) => UserHandle[];
  getRosterItem: (owner: UserHandle, contact: UserHandle) => RosterItemView;
  roster: (owner: UserHandle) => RosterItemView[];
  membersOf: (group: GroupHandle) => UserHandle[];
  adminsOf: (group: GroupHandle) => UserHandle[];
  childGroupsOf: (group: GroupHandle) => GroupHandle[];
}

export type RosterQueryName = keyof RosterQueries;

const subscriptionType = (to: boolean, from: boolean): SubscriptionType => {
  if (to && from) return 'BOTH';
  if (to) return 'TO';
  if (from) return 'FROM';
  return 'NONE';
};

const byName = (names: string[]): string[] =>
  [...names].sort((a, b) => a.localeCompare(b));

/**
 * Derived reads over the roster state. Dependencies form a DAG:
 * roster -> getRosterItem -> hasSubscriptionTo -> hasSharedGroups /
 * sharedGroups -> groupIsVisible -> inGroup.
 */
export const createRosterQueries = (
  host: RosterHost
): QueryDefinitions<RosterState, RosterQueries> => ({
  findUser: {
    dependsOn: [],
    evaluate: ({ state }, username) =>
      from(state.users)
        .where((u) => userOf(state, u).username === username)
        .unique('users', `username "${username}"`),
  },

  findGroup: {
    dependsOn: [],
    evaluate: ({ state }, name) =>
      from(state.groups)
        .where((g) => groupOf(state, g).name === name)
        .unique('groups', `name "${name}"`),
  },

  hasUser: {
    dependsOn: [],
    evaluate: ({ state }, username) =>
      from(state.users).exists((u) => userOf(state, u).username === username),
  },

  hasGroup: {
    dependsOn: [],
    evaluate: ({ state }, name) =>
      from(state.groups).exists((g) => groupOf(state, g).name === name),
  },

  findRosterItem: {
    dependsOn: [],
    evaluate: ({ state }, owner, target) => {
      const { username } = userOf(state, owner);
      const targetName = userOf(state, target).username;
      return from(state.rosterItems)
        .where((e) => {
          const item = rosterItemOf(state, e);
          return (
            item.username === username &&
            host.resolveUsername(item.jid) === targetName
          );
        })
        .atMostOne('rosterItems', `${username} -> ${targetName}`);
    },
  },

  findRosterItemById: {
    dependsOn: [],
    evaluate: ({ state }, id) =>
      from(state.rosterItems)
        .where((e) => rosterItemOf(state, e).id === id)
        .atMostOne('rosterItems', `id ${id}`),
  },

  inGroup: {
    dependsOn: [],
    evaluate: ({ state }, group, user) =>
      from(state.groupMembers).exists(([g, u]) => g === group && u === user),
  },

  isAdmin: {
    dependsOn: [],
    evaluate: ({ state }, group, user) => state.admins.contains(group, user),
  },

  // One hop only: members of a child's children do not see the group.
  groupIsVisible: {
    dependsOn: ['inGroup'],
    evaluate: (ctx, group, user) => {
      const { state } = ctx;
      const { rosterMode } = groupOf(state, group);
      if (rosterMode === 'EVERYBODY') return true;
      if (rosterMode !== 'ONLY_GROUP') return false;
      return (
        ctx.call('inGroup', group, user) ||
        from(state.groups).exists(
          (sub) =>
            state.childGroups.contains(group, sub) &&
            ctx.call('inGroup', sub, user)
        )
      );
    },
  },

  sharedGroups: {
    dependsOn: ['inGroup', 'groupIsVisible'],
    evaluate: (ctx, viewer, contact) =>
      from(ctx.state.groups)
        .where(
          (g) =>
            ctx.call('inGroup', g, contact) &&
            ctx.call('groupIsVisible', g, viewer)
        )
        .distinct()
        .toArray(),
  },

  hasSharedGroups: {
    dependsOn: ['inGroup', 'groupIsVisible'],
    evaluate: (ctx, viewer, contact) =>
      from(ctx.state.groups).exists(
        (g) =>
          ctx.call('inGroup', g, contact) &&
          ctx.call('groupIsVisible', g, viewer)
      ),
  },

  hasSubscriptionTo: {
    dependsOn: ['findRosterItem', 'hasSharedGroups'],
    evaluate: (ctx, subscriber, contact) =>
      subscriber !== contact &&
      (ctx.call('findRosterItem', subscriber, contact) !== undefined ||
        ctx.call('hasSharedGroups', subscriber, contact)),
  },

  usersWatchingGroup: {
    dependsOn: ['groupIsVisible'],
    evaluate: (ctx, group) =>
      from(ctx.state.users)
        .where((u) => ctx.call('groupIsVisible', group, u))
        .distinct()
        .toArray(),
  },

  getRosterItem: {
    dependsOn: ['hasSubscriptionTo', 'findRosterItem', 'sharedGroups'],
    evaluate: (ctx, owner, contact) => {
      const { state } = ctx;
      const subscribedTo = ctx.call('hasSubscriptionTo', owner, contact);
      const subscribedFrom = ctx.call('hasSubscriptionTo', contact, owner);
      const explicit = ctx.call('findRosterItem', owner, contact);
      const item = explicit ? rosterItemOf(state, explicit) : undefined;
      return {
        username: userOf(state, owner).username,
        target: userOf(state, contact).username,
        subscription: subscriptionType(subscribedTo, subscribedFrom),
        subscribedTo,
        subscribedFrom,
        explicit: item !== undefined,
        nickname: item ? item.nickname : null,
        askStatus: item ? item.askStatus : host.defaultAskStatus(),
        recvStatus: item ? item.recvStatus : host.defaultRecvStatus(),
        sharedGroups: byName(
          ctx
            .call('sharedGroups', owner, contact)
            .map((g) => groupOf(state, g).name)
        ),
      };
    },
  },

  roster: {
    dependsOn: ['hasSubscriptionTo', 'getRosterItem'],
    evaluate: (ctx, owner) =>
      from(ctx.state.users)
        .distinct()
        .where(
          (u) =>
            u !== owner &&
            (ctx.call('hasSubscriptionTo', owner, u) ||
              ctx.call('hasSubscriptionTo', u, owner))
        )
        .select((u) => ctx.call('getRosterItem', owner, u))
        .toArray((a, b) => a.target.localeCompare(b.target)),
  },

  membersOf: {
    dependsOn: [],
    evaluate: ({ state }, group) => [...state.groupMembers.image(group)],
  },

  adminsOf: {
    dependsOn: [],
    evaluate: ({ state }, group) => [...state.admins.image(group)],
  },

  childGroupsOf: {
    dependsOn: [],
    evaluate: ({ state }, group) => [...state.childGroups.image(group)],
  },
});
