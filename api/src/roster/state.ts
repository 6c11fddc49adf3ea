import { HandleStore } from '../engine/handles';
import { Bag, Relation } from '../engine/relations';
import type {
  Group,
  GroupHandle,
  RosterItem,
  RosterItemHandle,
  User,
  UserHandle,
} from './roster';

export type RosterState = {
  readonly userCells: HandleStore<'user', User>;
  readonly rosterItemCells: HandleStore<'rosterItem', RosterItem>;
  readonly groupCells: HandleStore<'group', Group>;
  readonly users: Bag<UserHandle>;
  readonly rosterItems: Bag<RosterItemHandle>;
  readonly groups: Bag<GroupHandle>;
  /** parent -> child; only meaningful for ONLY_GROUP parents */
  readonly childGroups: Relation<GroupHandle, GroupHandle>;
  readonly groupMembers: Relation<GroupHandle, UserHandle>;
  readonly admins: Relation<GroupHandle, UserHandle>;
};

export const createRosterState = (): RosterState => ({
  userCells: new HandleStore('user'),
  rosterItemCells: new HandleStore('rosterItem'),
  groupCells: new HandleStore('group'),
  users: new Bag('users'),
  rosterItems: new Bag('rosterItems'),
  groups: new Bag('groups'),
  childGroups: new Relation('childGroups'),
  groupMembers: new Relation('groupMembers'),
  admins: new Relation('admins'),
});

export const userOf = (state: RosterState, user: UserHandle): Readonly<User> =>
  state.userCells.get(user);

export const groupOf = (
  state: RosterState,
  group: GroupHandle
): Readonly<Group> => state.groupCells.get(group);

export const rosterItemOf = (
  state: RosterState,
  item: RosterItemHandle
): Readonly<RosterItem> => state.rosterItemCells.get(item);
