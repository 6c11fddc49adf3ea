import {
  COMMITTED,
  INVARIANT_VIOLATION,
  PRECONDITION_VIOLATION,
} from '../../engine/errors';
import { GroupService } from '../../groups/service';
import { RosterEngine } from '../../roster/engine';
import { RosterService } from '../../roster/service';
import { UserService } from '../../users/service';
import type { RosterSnapshot } from '../admin';
import { AdminService } from '../service';

const snapshot = (): RosterSnapshot => ({
  users: ['alice', 'bob'].map((username) => ({
    username,
    password: 'test-secret',
    displayName: username,
    email: `${username}@example.test`,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  })),
  rosterItems: [
    {
      id: 1,
      username: 'alice',
      jid: 'bob@example.com',
      nickname: null,
      askStatus: 'NONE',
      recvStatus: 'NONE',
    },
  ],
  groups: [
    { name: 'parent', displayName: 'Parent', description: '', rosterMode: 'ONLY_GROUP' },
    { name: 'child', displayName: 'Child', description: '', rosterMode: 'NOBODY' },
  ],
  childGroups: [{ parent: 'parent', child: 'child' }],
  groupMembers: [{ group: 'child', username: 'bob' }],
  admins: [{ group: 'parent', username: 'alice' }],
});

describe('AdminService', () => {
  let engine: RosterEngine;
  let admin: AdminService;

  beforeEach(() => {
    engine = new RosterEngine();
    admin = new AdminService(engine);
  });

  test('imports a consistent snapshot and exports it unchanged', () => {
    expect(admin.importSnapshot(snapshot())).toBe(COMMITTED);
    expect(admin.exportSnapshot()).toEqual(snapshot());
    expect(new GroupService(engine).getWatchers('parent')).toEqual(['bob']);
    expect(new RosterService(engine).getRosterItem('alice', 'bob')).toMatchObject({
      subscription: 'TO',
    });
  });

  test('replaces whatever was there before', () => {
    new UserService(engine).registerUser({
      username: 'zed',
      displayName: 'Zed',
      email: 'zed@example.test',
      password: 'test-secret',
    });

    admin.importSnapshot(snapshot());

    expect(new UserService(engine).getAllUsers().map((u) => u.username)).toEqual([
      'alice',
      'bob',
    ]);
  });

  test('rejects a snapshot that names a missing user and keeps the old store', () => {
    admin.importSnapshot(snapshot());
    const broken = snapshot();
    broken.users = broken.users.filter((u) => u.username !== 'bob');

    const result = admin.importSnapshot(broken);

    expect(result).toMatchObject({
      error: INVARIANT_VIOLATION,
      operation: 'replace',
      violations: [
        {
          invariant: 'group-members-present',
          relation: 'groupMembers',
        },
      ],
    });
    expect(admin.exportSnapshot()).toEqual(snapshot());
  });

  test('rejects duplicate names and a child under a parent that is not ONLY_GROUP', () => {
    const broken = snapshot();
    broken.groups = broken.groups.map((g) => ({ ...g, rosterMode: 'EVERYBODY' as const }));
    broken.users.push({ ...snapshot().users[0] });

    const result = admin.importSnapshot(broken);

    expect(result !== COMMITTED && result.violations.map((v) => v.invariant)).toEqual([
      'unique-username',
      'child-group-parent-mode',
    ]);
    expect(engine.state.users.size).toBe(0);
  });

  test('stores imported names in the form they are looked up by', () => {
    const mixed = snapshot();
    mixed.users = mixed.users.map((u) => ({ ...u, username: ` ${u.username.toUpperCase()} ` }));
    mixed.rosterItems = mixed.rosterItems.map((item) => ({ ...item, username: 'Alice' }));
    mixed.groups = mixed.groups.map((g) => ({ ...g, name: ` ${g.name} ` }));
    mixed.groupMembers = [{ group: 'child ', username: 'BOB' }];
    mixed.admins = [{ group: ' parent', username: 'Alice' }];

    expect(admin.importSnapshot(mixed)).toBe(COMMITTED);
    expect(admin.exportSnapshot()).toEqual(snapshot());
    expect(new UserService(engine).getUserByUsername('alice')).toMatchObject({
      username: 'alice',
    });
    expect(
      new UserService(engine).registerUser({
        username: 'alice',
        displayName: 'Alice',
        email: 'alice@example.test',
        password: 'test-secret',
      })
    ).toMatchObject({ error: PRECONDITION_VIOLATION });
  });

  test('rejects two users whose names differ only in case', () => {
    const clash = snapshot();
    clash.users.push({ ...snapshot().users[0], username: 'Alice' });

    const result = admin.importSnapshot(clash);

    expect(result !== COMMITTED && result.violations.map((v) => v.invariant)).toEqual([
      'unique-username',
    ]);
    expect(engine.state.users.size).toBe(0);
  });

  test('continues roster item ids past the imported ones', () => {
    admin.importSnapshot(snapshot());

    expect(
      new RosterService(engine).addRosterItem('bob', { jid: 'alice@example.com' })
    ).toMatchObject({ id: 2 });
  });

  test('reports the invariants of the live store', () => {
    admin.importSnapshot(snapshot());

    expect(admin.checkInvariants()).toEqual({
      holds: true,
      invariants: [
        'unique-username',
        'unique-roster-item-id',
        'unique-roster-item-target',
        'unique-group-name',
        'child-group-parent-mode',
        'child-groups-present',
        'group-members-present',
        'admins-present',
      ],
      violations: [],
    });
  });
});
