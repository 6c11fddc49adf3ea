import type { Handle } from '../engine/handles';

export type AskStatus = 'NONE' | 'SUBSCRIBE' | 'UNSUBSCRIBE';
export type RecvStatus = 'NONE' | 'SUBSCRIBE' | 'UNSUBSCRIBE';
export type RosterMode = 'NOBODY' | 'ONLY_GROUP' | 'EVERYBODY';
export type SubscriptionType = 'NONE' | 'TO' | 'FROM' | 'BOTH';

export const ASK_STATUSES: readonly AskStatus[] = [
  'NONE',
  'SUBSCRIBE',
  'UNSUBSCRIBE',
];
export const RECV_STATUSES: readonly RecvStatus[] = [
  'NONE',
  'SUBSCRIBE',
  'UNSUBSCRIBE',
];
export const ROSTER_MODES: readonly RosterMode[] = [
  'NOBODY',
  'ONLY_GROUP',
  'EVERYBODY',
];

export interface User {
  username: string;
  password: string;
  displayName: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface RosterItem {
  id: number;
  username: string;
  jid: string;
  nickname: string | null;
  askStatus: AskStatus;
  recvStatus: RecvStatus;
}

export interface Group {
  name: string;
  displayName: string;
  description: string;
  rosterMode: RosterMode;
}

export type UserHandle = Handle<'user'>;
export type RosterItemHandle = Handle<'rosterItem'>;
export type GroupHandle = Handle<'group'>;

/** What one user's roster shows about another. */
export interface RosterItemView {
  username: string;
  target: string;
  subscription: SubscriptionType;
  subscribedTo: boolean;
  subscribedFrom: boolean;
  explicit: boolean;
  nickname: string | null;
  askStatus: AskStatus;
  recvStatus: RecvStatus;
  sharedGroups: string[];
}

/**
 * Pure functions the host supplies. They must be total and deterministic;
 * the engine calls them while evaluating preconditions, invariants and
 * queries.
 */
export interface RosterHost {
  resolveUsername(jid: string): string;
  defaultAskStatus(): AskStatus;
  defaultRecvStatus(): RecvStatus;
}

/** `Alice@example.com/phone` resolves to `alice`. */
export const bareUsername = (jid: string): string => {
  const bare = jid.split('/')[0] ?? '';
  const at = bare.indexOf('@');
  return (at >= 0 ? bare.slice(0, at) : bare).toLowerCase();
};

export const defaultHost: RosterHost = {
  resolveUsername: bareUsername,
  defaultAskStatus: () => 'NONE',
  defaultRecvStatus: () => 'NONE',
};
