import bcrypt from "bcryptjs";
import crypto from "crypto";

const SALT_ROUNDS = 10;
const SHA256_HEX = /^[a-f0-9]{64}$/i;
const BCRYPT = /^\$2[abxy]\$\d{2}\$/;

export const hashPassword = async (password: string): Promise<string> =>
  bcrypt.hash(password, await bcrypt.genSalt(SALT_ROUNDS));

const sha256 = (value: string): string => crypto.createHash("sha256").update(value).digest("hex");

/**
 * Checks a password against a stored value. Besides bcrypt hashes, user files
 * written by earlier versions hold unsalted SHA-256 hex digests or, for the
 * oldest entries, the plain password itself.
 */
export const verifyPassword = async (password: string, stored: string): Promise<boolean> => {
  if (BCRYPT.test(stored)) {
    return bcrypt.compare(password, stored);
  }
  const [candidate, expected] = SHA256_HEX.test(stored)
    ? [sha256(password), stored.toLowerCase()]
    : [password, stored];
  const a = Buffer.from(candidate);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

export const isLegacyHash = (stored: string): boolean => !BCRYPT.test(stored);
