/**
 * Environment Parsing Tests
 */

import { parsePositiveInt } from '../env';

describe('parsePositiveInt', () => {
  it('should parse a positive integer', () => {
    expect(parsePositiveInt('8', 3)).toBe(8);
  });

  it('should fall back when the value is unset', () => {
    expect(parsePositiveInt(undefined, 3)).toBe(3);
    expect(parsePositiveInt('', 3)).toBe(3);
  });

  it('should fall back when the value is malformed or not positive', () => {
    expect(parsePositiveInt('abc', 3)).toBe(3);
    expect(parsePositiveInt('0', 3)).toBe(3);
    expect(parsePositiveInt('-2', 3)).toBe(3);
  });
});
