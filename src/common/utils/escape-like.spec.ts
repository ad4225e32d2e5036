import { escapeLike } from './escape-like';

describe('escapeLike', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLike('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });

  it('leaves plain text alone', () => {
    expect(escapeLike('hello world')).toBe('hello world');
  });
});
