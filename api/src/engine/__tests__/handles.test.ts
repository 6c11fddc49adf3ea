import { ForeignHandleError, HandleDisposedError } from '../errors';
import { describeHandle, HandleStore } from '../handles';

interface Note {
  text: string;
}

describe('HandleStore', () => {
  test('issues frozen handles with increasing ids', () => {
    const notes = new HandleStore<'note', Note>('note');
    const a = notes.create({ text: 'a' });
    const b = notes.create({ text: 'b' });

    expect(a).toEqual({ kind: 'note', id: 1 });
    expect(b.id).toBe(2);
    expect(Object.isFrozen(a)).toBe(true);
    expect(describeHandle(b)).toBe('note#2');
  });

  test('handles with the same value are distinct entities', () => {
    const notes = new HandleStore<'note', Note>('note');
    const a = notes.create({ text: 'same' });
    const b = notes.create({ text: 'same' });

    expect(a).not.toBe(b);
    expect(notes.get(a)).toEqual(notes.get(b));
  });

  test('copies values in and replaces them on update', () => {
    const notes = new HandleStore<'note', Note>('note');
    const value = { text: 'draft' };
    const note = notes.create(value);
    value.text = 'changed outside';

    expect(notes.get(note).text).toBe('draft');

    const before = notes.get(note);
    notes.mutate(note, (n) => ({ ...n, text: 'final' }));
    expect(notes.get(note).text).toBe('final');
    expect(before.text).toBe('draft');

    notes.set(note, { text: 'reset' });
    expect(notes.get(note).text).toBe('reset');
  });

  test('rejects a structurally equal handle it did not issue', () => {
    const notes = new HandleStore<'note', Note>('note');
    notes.create({ text: 'a' });

    expect(() => notes.get({ kind: 'note', id: 1 })).toThrow(ForeignHandleError);
  });

  test('rejects disposed handles and never reuses their ids', () => {
    const notes = new HandleStore<'note', Note>('note');
    const note = notes.create({ text: 'a' });
    notes.dispose(note);

    expect(notes.isAlive(note)).toBe(false);
    expect(() => notes.get(note)).toThrow(HandleDisposedError);
    expect(notes.create({ text: 'b' }).id).toBe(2);
  });

  test('restores cells from a checkpoint but keeps ids spent', () => {
    const notes = new HandleStore<'note', Note>('note');
    const kept = notes.create({ text: 'kept' });
    const restore = notes.checkpoint();

    notes.mutate(kept, () => ({ text: 'edited' }));
    const added = notes.create({ text: 'added' });
    restore();

    expect(notes.get(kept).text).toBe('kept');
    expect(notes.isAlive(added)).toBe(false);
    expect([...notes.handles()]).toEqual([kept]);
    expect(notes.create({ text: 'next' }).id).toBe(3);
  });
});

describe('HandleStore bookkeeping', () => {
  test('forgets disposed handles', () => {
    const notes = new HandleStore<'note', Note>('note');
    const kept = notes.create({ text: 'kept' });
    for (let i = 0; i < 100; i++) {
      notes.dispose(notes.create({ text: `scratch ${i}` }));
    }

    expect(notes.size).toBe(1);
    expect([...notes.handles()]).toEqual([kept]);
  });

  test('forgets every handle on clear and brings them back on restore', () => {
    const notes = new HandleStore<'note', Note>('note');
    const note = notes.create({ text: 'a' });
    const restore = notes.checkpoint();

    notes.clear();
    expect(notes.size).toBe(0);
    expect(() => notes.get(note)).toThrow(HandleDisposedError);

    restore();
    expect(notes.size).toBe(1);
    expect(notes.get(note).text).toBe('a');
  });

  test('still rejects handles it never issued', () => {
    const notes = new HandleStore<'note', Note>('note');

    expect(() => notes.get({ kind: 'note', id: 5 })).toThrow(ForeignHandleError);
  });
});
