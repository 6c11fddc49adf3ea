import type { RosterMode } from '../roster/roster';

export interface GroupView {
  name: string;
  displayName: string;
  description: string;
  rosterMode: RosterMode;
  members: string[];
  admins: string[];
  childGroups: string[];
}

export interface CreateGroupRequest {
  name: string;
  displayName?: string;
  description?: string;
  rosterMode?: RosterMode;
}

export interface UpdateGroupRequest {
  displayName?: string;
  description?: string;
  rosterMode?: RosterMode;
}
