import db from '../db';
import { COMMITTED, OperationFailure, OperationResult } from '../engine/errors';
import { from } from '../engine/comprehension';
import { UserNotFoundError, UserService, USER_NOT_FOUND } from '../users/service';
import { RosterEngine } from './engine';
import type {
  AskStatus,
  RecvStatus,
  RosterItem,
  RosterItemHandle,
  RosterItemView,
} from './roster';

export type RosterItemNotFoundError = 'ROSTER_ITEM_NOT_FOUND';
export const ROSTER_ITEM_NOT_FOUND: RosterItemNotFoundError =
  'ROSTER_ITEM_NOT_FOUND';

export interface NewRosterItem {
  jid: string;
  nickname?: string | null;
  askStatus?: AskStatus;
  recvStatus?: RecvStatus;
}

export interface RosterItemUpdate {
  nickname?: string | null;
  askStatus?: AskStatus;
  recvStatus?: RecvStatus;
}

export class RosterService {
  private readonly users: UserService;

  constructor(private readonly engine: RosterEngine = db) {
    this.users = new UserService(engine);
  }

  public getRoster(username: string): RosterItemView[] | UserNotFoundError {
    const user = this.users.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    return this.engine.query('roster', user);
  }

  public getRosterItem(
    username: string,
    contact: string
  ): RosterItemView | UserNotFoundError {
    const owner = this.users.lookup(username);
    const target = this.users.lookup(contact);
    if (owner === USER_NOT_FOUND || target === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    return this.engine.query('getRosterItem', owner, target);
  }

  /** Explicit items owned by `username`, whether or not the contact exists. */
  public getItems(username: string): RosterItem[] | UserNotFoundError {
    const owner = this.users.lookup(username);
    if (owner === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    const ownerName = this.engine.user(owner).username;
    return from(this.engine.state.rosterItems)
      .select((item) => ({ ...this.engine.rosterItem(item) }))
      .where((item) => item.username === ownerName)
      .toArray((a, b) => a.id - b.id);
  }

  public addRosterItem(
    username: string,
    request: NewRosterItem
  ): RosterItem | UserNotFoundError | OperationFailure {
    const owner = this.users.lookup(username);
    if (owner === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }

    const item = this.engine.newRosterItem({
      id: this.engine.nextRosterItemId(),
      username: this.engine.user(owner).username,
      jid: request.jid.trim(),
      nickname: request.nickname ?? null,
      askStatus: request.askStatus ?? this.engine.host.defaultAskStatus(),
      recvStatus: request.recvStatus ?? this.engine.host.defaultRecvStatus(),
    });

    const result = this.engine.apply('addRosterItem', item);
    if (result !== COMMITTED) {
      this.engine.dispose(item);
      return result;
    }

    return { ...this.engine.rosterItem(item) };
  }

  public updateRosterItem(
    username: string,
    id: number,
    update: RosterItemUpdate
  ): RosterItem | RosterItemNotFoundError | OperationFailure {
    const item = this.ownedItem(username, id);
    if (item === ROSTER_ITEM_NOT_FOUND) {
      return ROSTER_ITEM_NOT_FOUND;
    }

    const steps: Array<() => OperationResult> = [];
    const { nickname, askStatus, recvStatus } = update;
    if (nickname !== undefined) {
      steps.push(() => this.engine.apply('setNickname', item, nickname));
    }
    if (askStatus !== undefined) {
      steps.push(() => this.engine.apply('setAskStatus', item, askStatus));
    }
    if (recvStatus !== undefined) {
      steps.push(() => this.engine.apply('setRecvStatus', item, recvStatus));
    }

    for (const step of steps) {
      const result = step();
      if (result !== COMMITTED) {
        return result;
      }
    }

    return { ...this.engine.rosterItem(item) };
  }

  public removeRosterItem(
    username: string,
    id: number
  ): void | RosterItemNotFoundError | OperationFailure {
    const item = this.ownedItem(username, id);
    if (item === ROSTER_ITEM_NOT_FOUND) {
      return ROSTER_ITEM_NOT_FOUND;
    }

    const result = this.engine.apply('rmRosterItem', item);
    if (result !== COMMITTED) {
      return result;
    }

    this.engine.dispose(item);
  }

  private ownedItem(
    username: string,
    id: number
  ): RosterItemHandle | RosterItemNotFoundError {
    const item = this.engine.query('findRosterItemById', id);
    const owner = this.users.lookup(username);
    if (
      item === undefined ||
      owner === USER_NOT_FOUND ||
      this.engine.rosterItem(item).username !== this.engine.user(owner).username
    ) {
      return ROSTER_ITEM_NOT_FOUND;
    }
    return item;
  }
}
