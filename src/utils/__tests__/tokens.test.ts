import { tokenLength } from '../tokens';

describe('tokenLength', () => {
  it('counts o200k_base tokens', () => {
    expect(tokenLength('')).toBe(0);
    expect(tokenLength('hello world')).toBe(2);
  });
});
