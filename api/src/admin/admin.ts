import type { Group, RosterItem } from '../roster/roster';

export interface SnapshotUser {
  username: string;
  password: string;
  displayName: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export interface GroupUserPair {
  group: string;
  username: string;
}

export interface ChildGroupPair {
  parent: string;
  child: string;
}

/** Serialised form of the whole store, keyed by names instead of handles. */
export interface RosterSnapshot {
  users: SnapshotUser[];
  rosterItems: RosterItem[];
  groups: Group[];
  childGroups: ChildGroupPair[];
  groupMembers: GroupUserPair[];
  admins: GroupUserPair[];
}

export interface InvariantReport {
  holds: boolean;
  invariants: string[];
  violations: {
    invariant: string;
    relation: string;
    message: string;
  }[];
}
