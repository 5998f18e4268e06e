import { StateSet } from './sets.js';

describe('StateSet', () => {
  test('iterates members in ascending order', () => {
    const set = new StateSet(40, [33, 2, 7]);
    expect([...set]).toEqual([2, 7, 33]);
    expect(set.size).toBe(3);
  });

  test('has', () => {
    const set = new StateSet(40, [33, 2, 7]);
    expect(set.has(33)).toBe(true);
    expect(set.has(34)).toBe(false);
    expect(set.has(-1)).toBe(false);
    expect(set.has(100)).toBe(false);
  });

  test('add rejects indices outside the capacity', () => {
    const set = new StateSet(4);
    expect(() => set.add(4)).toThrow('IndexError: 4 is not valid. Must be < 4');
    expect(() => set.add(-1)).toThrow(/IndexError/);
  });

  test('isEmpty', () => {
    const set = new StateSet(3);
    expect(set.isEmpty()).toBe(true);
    set.add(2);
    expect(set.isEmpty()).toBe(false);
  });

  test('key', () => {
    expect(new StateSet(40, [33, 2, 7]).key()).toBe('0000008400000002');
    expect(new StateSet(32, [31]).key()).toBe('80000000');
    expect(new StateSet(0).key()).toBe('');
  });

  test('the highest bit of a word', () => {
    const set = new StateSet(32, [31]);
    expect([...set]).toEqual([31]);
    expect(set.size).toBe(1);
    expect(set.has(31)).toBe(true);
  });

  test('equals', () => {
    expect(new StateSet(8, [1, 2, 3]).equals(new StateSet(8, [3, 1, 2]))).toBe(
      true
    );
    expect(new StateSet(8, [1, 2, 4]).equals(new StateSet(8, [1, 2, 3]))).toBe(
      false
    );
    expect(new StateSet(8, [1, 2]).equals(new StateSet(8, [1, 2, 4]))).toBe(
      false
    );
  });

  test('toDebugStr', () => {
    expect(new StateSet(10, [6, 2, 7, 3]).toDebugStr()).toBe('{2,3,6,7}');
    expect(new StateSet(10).toDebugStr()).toBe('{}');
  });

  test('freeze rejects further adds', () => {
    const set = new StateSet(4, [1]);
    const frozen = set.freeze();
    expect(() => set.add(2)).toThrow('StateSet {1} is frozen');
    expect([...frozen]).toEqual([1]);
    expect(frozen.has(2)).toBe(false);
  });
});
