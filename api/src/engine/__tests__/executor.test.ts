import {
  COMMITTED,
  INVARIANT_VIOLATION,
  PRECONDITION_VIOLATION,
  ReentrantOperationError,
} from '../errors';
import { OperationDefinitions, OperationExecutor } from '../executor';
import { Handle, HandleStore } from '../handles';
import { InvariantSet, uniqueBy } from '../invariants';
import { Bag } from '../relations';
import { Store } from '../store';

type Account = Handle<'account'>;

const createState = () => ({
  cells: new HandleStore<'account', { owner: string; balance: number }>(
    'account'
  ),
  accounts: new Bag<Account>('accounts'),
});

type State = ReturnType<typeof createState>;

interface BankOperations {
  open: (account: Account) => void;
  close: (account: Account) => void;
  deposit: (account: Account, amount: number) => void;
  openTwice: (account: Account) => void;
  explode: (account: Account) => void;
  nested: (account: Account) => void;
  peek: (account: Account) => void;
}

const setup = () => {
  const state = createState();
  const store = new Store(state);
  const invariants = new InvariantSet<State>([
    uniqueBy(
      'unique-owner',
      'accounts',
      (s: State) => s.accounts,
      (account, s) => s.cells.get(account).owner
    ),
    {
      name: 'non-negative-balance',
      relation: 'accounts',
      description: 'no account is overdrawn',
      check: (s) =>
        [...s.accounts]
          .filter((a) => s.cells.get(a).balance < 0)
          .map((a) => `${s.cells.get(a).owner} is overdrawn`),
    },
  ]);

  let executor: OperationExecutor<State, BankOperations>;
  const operations: OperationDefinitions<State, BankOperations> = {
    open: {
      requires: [
        {
          description: 'account is not open',
          relation: 'accounts',
          holds: (s, account) => !s.accounts.contains(account),
        },
      ],
      effect: (s, account) => s.accounts.add(account),
    },
    close: {
      requires: [],
      effect: (s, account) => {
        s.accounts.remove(account);
      },
    },
    deposit: {
      requires: [],
      effect: (s, account, amount) =>
        s.cells.mutate(account, (a) => ({ ...a, balance: a.balance + amount })),
    },
    // Skips its own guard, so only the invariant catches the duplicate.
    openTwice: {
      requires: [],
      effect: (s, account) => {
        s.accounts.add(account);
        s.accounts.add(account);
      },
    },
    explode: {
      requires: [],
      effect: (s, account) => {
        s.accounts.remove(account);
        throw new Error('boom');
      },
    },
    nested: {
      requires: [],
      effect: (_s, account) => {
        executor.apply('close', account);
      },
    },
    peek: {
      requires: [],
      effect: () => executor.assertReadable('balance'),
    },
  };
  executor = new OperationExecutor<State, BankOperations>(
    store,
    operations,
    invariants
  );

  return { state, executor };
};

describe('OperationExecutor', () => {
  test('commits an operation whose precondition and invariants hold', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });

    expect(executor.apply('open', account)).toBe(COMMITTED);
    expect(state.accounts.contains(account)).toBe(true);
  });

  test('refuses an operation whose precondition fails and leaves the state alone', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });
    executor.apply('open', account);

    expect(executor.apply('open', account)).toEqual({
      error: PRECONDITION_VIOLATION,
      operation: 'open',
      requirement: 'account is not open',
      relation: 'accounts',
      args: ['account#1'],
    });
    expect(state.accounts.count(account)).toBe(1);
  });

  test('rolls back an effect that breaks an invariant', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 10 });
    executor.apply('open', account);

    const result = executor.apply('deposit', account, -25);

    expect(result).toEqual({
      error: INVARIANT_VIOLATION,
      operation: 'deposit',
      violations: [
        {
          invariant: 'non-negative-balance',
          relation: 'accounts',
          message: 'ann is overdrawn',
        },
      ],
      args: ['account#1', '-25'],
    });
    expect(state.cells.get(account).balance).toBe(10);
  });

  test('restores every collection when an effect leaves a duplicate', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });

    const result = executor.apply('openTwice', account);

    expect(result).toMatchObject({
      error: INVARIANT_VIOLATION,
      violations: [{ invariant: 'unique-owner', message: 'key "ann" appears 2 times' }],
    });
    expect(state.accounts.size).toBe(0);
  });

  test('restores the state and rethrows when an effect throws', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });
    executor.apply('open', account);

    expect(() => executor.apply('explode', account)).toThrow('boom');
    expect(state.accounts.contains(account)).toBe(true);
    expect(executor.isIdle()).toBe(true);
  });

  test('rejects an operation started from inside another', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });
    executor.apply('open', account);

    expect(() => executor.apply('nested', account)).toThrow(
      new ReentrantOperationError('close', 'nested')
    );
    expect(state.accounts.contains(account)).toBe(true);
  });

  test('refuses reads while an effect runs', () => {
    const { state, executor } = setup();
    const account = state.cells.create({ owner: 'ann', balance: 0 });

    expect(() => executor.apply('peek', account)).toThrow(
      'Cannot run balance while peek is in progress'
    );
    expect(() => executor.assertReadable('balance')).not.toThrow();
  });

  test('tells subscribers about commits only', () => {
    const { state, executor } = setup();
    const listener = jest.fn();
    const unsubscribe = executor.subscribe(listener);
    const account = state.cells.create({ owner: 'ann', balance: 0 });

    executor.apply('open', account);
    executor.apply('open', account);
    unsubscribe();
    executor.apply('close', account);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      operation: 'open',
      args: ['account#1'],
    });
  });

  test('a throwing listener neither fails the commit nor silences the others', () => {
    const { state, executor } = setup();
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const after = jest.fn();
    executor.subscribe(() => {
      throw new Error('listener broke');
    });
    executor.subscribe(after);
    const account = state.cells.create({ owner: 'ann', balance: 0 });

    expect(executor.apply('open', account)).toBe(COMMITTED);
    expect(state.accounts.contains(account)).toBe(true);
    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      'Operation listener failed after open:',
      new Error('listener broke')
    );
    error.mockRestore();
  });

  test('replaces the whole state when the new one is consistent', () => {
    const { state, executor } = setup();
    const old = state.cells.create({ owner: 'ann', balance: 0 });
    executor.apply('open', old);

    const created: Account[] = [];
    const result = executor.replace((s) => {
      const fresh = s.cells.create({ owner: 'bob', balance: 5 });
      s.accounts.add(fresh);
      created.push(fresh);
    });

    expect(result).toBe(COMMITTED);
    expect(state.cells.isAlive(old)).toBe(false);
    expect([...state.accounts]).toEqual(created);
  });

  test('keeps the old state when the replacement breaks an invariant', () => {
    const { state, executor } = setup();
    const old = state.cells.create({ owner: 'ann', balance: 0 });
    executor.apply('open', old);

    const result = executor.replace((s) => {
      const a = s.cells.create({ owner: 'bob', balance: 0 });
      const b = s.cells.create({ owner: 'bob', balance: 0 });
      s.accounts.add(a);
      s.accounts.add(b);
    });

    expect(result).toEqual({
      error: INVARIANT_VIOLATION,
      operation: 'replace',
      violations: [
        {
          invariant: 'unique-owner',
          relation: 'accounts',
          message: 'key "bob" appears 2 times',
        },
      ],
      args: [],
    });
    expect([...state.accounts]).toEqual([old]);
    expect(state.cells.get(old).owner).toBe('ann');
  });
});
