import { parseIterations } from './run';

describe('parseIterations', () => {
  test('runs without limit when no count is given', () => {
    expect(parseIterations([])).toBe(Infinity);
  });

  test('reads the iteration count', () => {
    expect(parseIterations(['--iterations', '250'])).toBe(250);
  });

  test.each([['abc'], ['0'], ['-5'], ['1.5']])('rejects --iterations %s', text => {
    expect(() => parseIterations(['--iterations', text])).toThrow(
      `--iterations expects a positive whole number, got '${text}'`,
    );
  });

  test('rejects a missing count', () => {
    expect(() => parseIterations(['--iterations'])).toThrow(
      "--iterations expects a positive whole number, got ''",
    );
  });
});
