import { createHash } from 'crypto';
import db from '../db';
import { COMMITTED, OperationFailure, OperationResult } from '../engine/errors';
import { from } from '../engine/comprehension';
import { RosterEngine } from '../roster/engine';
import type { UserHandle } from '../roster/roster';
import { UserRegistration, UserUpdate, UserView } from './users';

export type UserNotFoundError = 'USER_NOT_FOUND';
export const USER_NOT_FOUND: UserNotFoundError = 'USER_NOT_FOUND';

export const hashPassword = (password: string): string =>
  createHash('sha256').update(password).digest('hex');

export const normalizeUsername = (username: string): string =>
  username.trim().toLowerCase();

export const toUserView = (engine: RosterEngine, user: UserHandle): UserView => {
  const { username, displayName, email, createdAt, updatedAt } =
    engine.user(user);
  return {
    username,
    displayName,
    email,
    createdAt: createdAt.toISOString(),
    updatedAt: updatedAt.toISOString(),
  };
};

export class UserService {
  constructor(
    private readonly engine: RosterEngine = db,
    private readonly now: () => Date = () => new Date()
  ) {}

  public getAllUsers(): UserView[] {
    return from(this.engine.state.users)
      .distinct()
      .select((user) => toUserView(this.engine, user))
      .toArray((a, b) => a.username.localeCompare(b.username));
  }

  public lookup(username: string): UserHandle | UserNotFoundError {
    const key = normalizeUsername(username);
    if (!this.engine.query('hasUser', key)) {
      return USER_NOT_FOUND;
    }
    return this.engine.query('findUser', key);
  }

  public getUserByUsername(username: string): UserView | UserNotFoundError {
    const user = this.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    return toUserView(this.engine, user);
  }

  public registerUser(
    registration: UserRegistration
  ): UserView | OperationFailure {
    const at = this.now();
    const user = this.engine.newUser({
      username: normalizeUsername(registration.username),
      displayName: registration.displayName.trim(),
      email: registration.email.trim(),
      password: hashPassword(registration.password),
      createdAt: at,
      updatedAt: at,
    });

    const result = this.engine.apply('addUser', user);
    if (result !== COMMITTED) {
      this.engine.dispose(user);
      return result;
    }

    return toUserView(this.engine, user);
  }

  public verifyPassword(
    username: string,
    password: string
  ): boolean | UserNotFoundError {
    const user = this.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }
    return this.engine.user(user).password === hashPassword(password);
  }

  public updateUser(
    username: string,
    update: UserUpdate
  ): UserView | UserNotFoundError | OperationFailure {
    const user = this.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }

    const at = this.now();
    const steps: Array<() => OperationResult> = [];
    const { displayName, email, password } = update;
    if (displayName !== undefined) {
      steps.push(() =>
        this.engine.apply('setUserDisplayName', user, displayName.trim(), at)
      );
    }
    if (email !== undefined) {
      steps.push(() => this.engine.apply('setUserEmail', user, email.trim(), at));
    }
    if (password !== undefined) {
      steps.push(() =>
        this.engine.apply('setUserPassword', user, hashPassword(password), at)
      );
    }

    for (const step of steps) {
      const result = step();
      if (result !== COMMITTED) {
        return result;
      }
    }

    return toUserView(this.engine, user);
  }

  public deleteUser(
    username: string
  ): void | UserNotFoundError | OperationFailure {
    const user = this.lookup(username);
    if (user === USER_NOT_FOUND) {
      return USER_NOT_FOUND;
    }

    const result = this.engine.apply('rmUser', user);
    if (result !== COMMITTED) {
      return result;
    }

    this.engine.dispose(user);
  }
}
