type Env = Record<string, string | undefined>;

// bcrypt cost factor for password hashes.
export function bcryptRounds(env: Env = process.env): number {
  const rounds = parseInt(env.BCRYPT_ROUNDS || '10', 10);
  return Number.isNaN(rounds) ? 10 : rounds;
}
