import { colors, log, logger, useColors } from './debug.js';

describe('logger', () => {
  test('capture() collects log lines and returns the result', () => {
    const logs: string[] = [];
    const result = logger.capture(() => {
      log('first', 1);
      log('second');
      return 5;
    }, logs);
    expect(result).toBe(5);
    expect(logs).toEqual(['first 1', 'second']);
  });

  test('subscribe() returns an unsubscribe function', () => {
    const seen: unknown[][] = [];
    const unsubscribe = logger.subscribe((...args) => seen.push(args));
    log('before');
    unsubscribe();
    log('after');
    expect(seen).toEqual([['before']]);
  });
});

describe('colors', () => {
  afterEach(() => useColors(false));

  test('are plain text by default', () => {
    expect(colors.red('x')).toBe('x');
  });

  test('wrap text in escape codes once enabled', () => {
    useColors();
    expect(colors.red('x')).toBe('\u001b[31mx\u001b[0m');
    expect(colors.cyan('y')).toBe('\u001b[36my\u001b[0m');
  });
});
