import { HandleStore } from '../handles';
import { Bag, Relation } from '../relations';

const people = () => new HandleStore<'person', { name: string }>('person');

describe('Bag', () => {
  test('counts repeated handles', () => {
    const cells = people();
    const ann = cells.create({ name: 'ann' });
    const bob = cells.create({ name: 'bob' });
    const bag = new Bag('people');

    bag.add(ann);
    bag.add(ann);
    bag.add(bob);

    expect(bag.count(ann)).toBe(2);
    expect(bag.size).toBe(3);
    expect([...bag]).toEqual([ann, ann, bob]);

    expect(bag.remove(ann)).toBe(true);
    expect(bag.count(ann)).toBe(1);
    expect(bag.remove(ann)).toBe(true);
    expect(bag.contains(ann)).toBe(false);
    expect(bag.remove(ann)).toBe(false);
  });

  test('matches by identity, not by id alone', () => {
    const cells = people();
    const ann = cells.create({ name: 'ann' });
    const bag = new Bag('people');
    bag.add(ann);

    expect(bag.contains({ kind: 'person', id: ann.id })).toBe(false);
  });

  test('restores its contents from a checkpoint', () => {
    const cells = people();
    const ann = cells.create({ name: 'ann' });
    const bob = cells.create({ name: 'bob' });
    const bag = new Bag('people');
    bag.add(ann);

    const restore = bag.checkpoint();
    bag.add(ann);
    bag.add(bob);
    restore();

    expect(bag.count(ann)).toBe(1);
    expect(bag.contains(bob)).toBe(false);
  });
});

describe('Relation', () => {
  test('stores each pair once and answers image and preimage', () => {
    const cells = people();
    const [ann, bob, cid] = ['ann', 'bob', 'cid'].map((name) =>
      cells.create({ name })
    );
    if (!ann || !bob || !cid) throw new Error('setup');
    const follows = new Relation('follows');

    expect(follows.add(ann, bob)).toBe(true);
    expect(follows.add(ann, bob)).toBe(false);
    follows.add(ann, cid);
    follows.add(cid, bob);

    expect(follows.size).toBe(3);
    expect([...follows.image(ann)]).toEqual([bob, cid]);
    expect([...follows.preimage(bob)]).toEqual([ann, cid]);
    expect(follows.contains(bob, ann)).toBe(false);
    expect(follows.involves(cid)).toBe(true);

    expect(follows.remove(ann, bob)).toBe(true);
    expect(follows.remove(ann, bob)).toBe(false);
    expect(follows.contains(ann, bob)).toBe(false);
  });

  test('restores its pairs from a checkpoint', () => {
    const cells = people();
    const ann = cells.create({ name: 'ann' });
    const bob = cells.create({ name: 'bob' });
    const follows = new Relation('follows');
    follows.add(ann, bob);

    const restore = follows.checkpoint();
    follows.remove(ann, bob);
    follows.add(bob, ann);
    restore();

    expect([...follows]).toEqual([[ann, bob]]);
  });
});
