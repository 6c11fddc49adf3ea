import { COMMITTED } from '../../engine/errors';
import { RosterEngine } from '../engine';
import type {
  AskStatus,
  GroupHandle,
  RosterItemHandle,
  RosterMode,
  UserHandle,
} from '../roster';

export const at = new Date('2026-01-01T00:00:00.000Z');

export const addUser = (engine: RosterEngine, username: string): UserHandle => {
  const user = engine.newUser({
    username,
    password: 'test-secret',
    displayName: username,
    email: `${username}@example.test`,
    createdAt: at,
    updatedAt: at,
  });
  expect(engine.apply('addUser', user)).toBe(COMMITTED);
  return user;
};

export const addGroup = (
  engine: RosterEngine,
  name: string,
  rosterMode: RosterMode = 'ONLY_GROUP'
): GroupHandle => {
  const group = engine.newGroup({
    name,
    displayName: name,
    description: '',
    rosterMode,
  });
  expect(engine.apply('addGroup', group)).toBe(COMMITTED);
  return group;
};

export const addItem = (
  engine: RosterEngine,
  id: number,
  owner: string,
  jid: string,
  askStatus: AskStatus = 'NONE'
): RosterItemHandle => {
  const item = engine.newRosterItem({
    id,
    username: owner,
    jid,
    nickname: null,
    askStatus,
    recvStatus: 'NONE',
  });
  expect(engine.apply('addRosterItem', item)).toBe(COMMITTED);
  return item;
};

/** Every bag and relation, for comparing whole states. */
export const contents = (engine: RosterEngine) => {
  const { state } = engine;
  return {
    users: [...state.users].map((u) => ({ ...engine.user(u) })),
    rosterItems: [...state.rosterItems].map((i) => ({ ...engine.rosterItem(i) })),
    groups: [...state.groups].map((g) => ({ ...engine.group(g) })),
    childGroups: [...state.childGroups],
    groupMembers: [...state.groupMembers],
    admins: [...state.admins],
  };
};
