import {
  Invariant,
  InvariantSet,
  referencesPresent,
  uniqueBy,
} from '../engine/invariants';
import type { RosterHost } from './roster';
import { groupOf, rosterItemOf, RosterState, userOf } from './state';

export const createRosterInvariants = (
  host: RosterHost
): InvariantSet<RosterState> => {
  const parentIsOnlyGroup: Invariant<RosterState> = {
    name: 'child-group-parent-mode',
    relation: 'childGroups',
    description: 'every parent in childGroups has mode ONLY_GROUP',
    check: (state) =>
      [...state.childGroups]
        .filter(
          ([parent]) =>
            state.groupCells.isAlive(parent) &&
            groupOf(state, parent).rosterMode !== 'ONLY_GROUP'
        )
        .map(
          ([parent]) =>
            `group "${groupOf(state, parent).name}" has child groups but mode ${groupOf(state, parent).rosterMode}`
        ),
  };

  return new InvariantSet<RosterState>([
    uniqueBy(
      'unique-username',
      'users',
      (state: RosterState) => state.users,
      (user, state) => userOf(state, user).username
    ),
    uniqueBy(
      'unique-roster-item-id',
      'rosterItems',
      (state: RosterState) => state.rosterItems,
      (item, state) => String(rosterItemOf(state, item).id)
    ),
    uniqueBy(
      'unique-roster-item-target',
      'rosterItems',
      (state: RosterState) => state.rosterItems,
      (item, state) => {
        const { username, jid } = rosterItemOf(state, item);
        return `${username} -> ${host.resolveUsername(jid)}`;
      }
    ),
    uniqueBy(
      'unique-group-name',
      'groups',
      (state: RosterState) => state.groups,
      (group, state) => groupOf(state, group).name
    ),
    parentIsOnlyGroup,
    referencesPresent(
      'child-groups-present',
      'childGroups',
      (state: RosterState) => state.childGroups,
      {
        left: (state, parent) => state.groups.contains(parent),
        right: (state, child) => state.groups.contains(child),
      }
    ),
    referencesPresent(
      'group-members-present',
      'groupMembers',
      (state: RosterState) => state.groupMembers,
      {
        left: (state, group) => state.groups.contains(group),
        right: (state, user) => state.users.contains(user),
      }
    ),
    referencesPresent(
      'admins-present',
      'admins',
      (state: RosterState) => state.admins,
      {
        left: (state, group) => state.groups.contains(group),
        right: (state, user) => state.users.contains(user),
      }
    ),
  ]);
};
