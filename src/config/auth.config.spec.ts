import { bcryptRounds } from './auth.config';

describe('bcryptRounds', () => {
  it('defaults to 10', () => {
    expect(bcryptRounds({})).toBe(10);
    expect(bcryptRounds({ BCRYPT_ROUNDS: 'many' })).toBe(10);
  });

  it('honours BCRYPT_ROUNDS', () => {
    expect(bcryptRounds({ BCRYPT_ROUNDS: '4' })).toBe(4);
  });
});
