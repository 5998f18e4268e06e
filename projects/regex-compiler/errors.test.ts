import { ConstructionInvariantError, RegexSyntaxError } from './errors.js';

describe('RegexSyntaxError', () => {
  test('message names the position', () => {
    const error = new RegexSyntaxError(
      'DANGLING_OPERATOR',
      { from: 2, to: 3 },
      'Operator | is missing its right operand'
    );
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RegexSyntaxError');
    expect(error.message).toBe(
      'RegexSyntaxError at 2: Operator | is missing its right operand'
    );
  });

  test('attachSource() points at the problem', () => {
    const error = new RegexSyntaxError(
      'DANGLING_OPERATOR',
      { from: 2, to: 3 },
      'Operator | is missing its right operand'
    );
    error.attachSource('ab|');
    expect(error.message).toBe(
      [
        'RegexSyntaxError at 2: Operator | is missing its right operand',
        '  ab|',
        '  --^',
      ].join('\n')
    );
  });

  test('wide and empty spans', () => {
    const group = new RegexSyntaxError('EMPTY_GROUP', { from: 1, to: 3 }, 'Empty group ()');
    group.attachSource('a()');
    expect(group.message.split('\n')[2]).toBe('  -^^');

    const empty = new RegexSyntaxError(
      'EMPTY_EXPRESSION',
      { from: 0, to: 0 },
      "Can't convert an empty pattern"
    );
    empty.attachSource('');
    expect(empty.message.split('\n')[2]).toBe('  ^');
  });

  test('carets line up after characters outside the BMP', () => {
    const source = '\u{1D41A} b';
    const space = new RegexSyntaxError(
      'UNSUPPORTED_SYMBOL',
      { from: 2, to: 3 },
      'Unsupported symbol " "'
    );
    space.attachSource(source);
    expect(space.message.split('\n')[2]).toBe('  -^');

    const literal = new RegexSyntaxError('EMPTY_GROUP', { from: 0, to: 2 }, 'x');
    literal.attachSource(source);
    expect(literal.message.split('\n')[2]).toBe('  ^');
  });
});

describe('ConstructionInvariantError', () => {
  test('is distinguishable from syntax errors', () => {
    const error = new ConstructionInvariantError('missing operand');
    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(RegexSyntaxError);
    expect(error.name).toBe('ConstructionInvariantError');
    expect(error.message).toBe('ConstructionInvariantError: missing operand');
  });
});
