import { hashPassword as hashWithScrypt, verifyPassword as verifyWithScrypt } from "better-auth/crypto";
import { validationError } from "../domain/errors.js";

export const MIN_PASSWORD_LENGTH = 8;

// better-auth stores `<salt hex>:<derived key hex>`.
const STORED_HASH = /^[0-9a-f]+:[0-9a-f]+$/;

export async function hashPassword(password: string): Promise<string> {
  return hashWithScrypt(password);
}

/** Check a password against a stored hash. Malformed hashes never match. */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  if (!STORED_HASH.test(stored)) return false;
  return verifyWithScrypt({ hash: stored, password });
}

/** Password problems, empty when the password is acceptable. */
export function passwordProblems(password: string): string[] {
  const problems: string[] = [];
  if (password.length < MIN_PASSWORD_LENGTH) {
    problems.push(`This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`);
  }
  if (/^\d+$/.test(password)) {
    problems.push("This password is entirely numeric.");
  }
  return problems;
}

/** Check the confirmation and strength of a new password. Throws VALIDATION. */
export function assertNewPassword(password: string, confirmPassword: string): void {
  if (password !== confirmPassword) {
    throw validationError("Passwords do not match.");
  }
  const problems = passwordProblems(password);
  if (problems.length > 0) {
    throw validationError(problems[0], { password: problems });
  }
}
