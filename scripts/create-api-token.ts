/**
 * Issue API tokens from the command line.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npx tsx scripts/create-api-token.ts <username>
 *   DATABASE_URL=postgres://... npx tsx scripts/create-api-token.ts --all
 *
 * Each plaintext token is printed once; only its digest is stored.
 */

import { pathToFileURL } from "node:url";
import { Pool } from "pg";
import { DrizzleApiTokenRepository } from "../src/auth/api-token-repository.js";
import { DrizzleUserRepository, type User } from "../src/auth/user-repository.js";
import { config } from "../src/config/index.js";
import { logger } from "../src/config/logger.js";
import { createDb, type DrizzleDb } from "../src/db/index.js";

export interface IssuedToken {
  username: string;
  token: string;
}

export type TokenTarget = { username: string } | { all: true };

/** Issue one token for a user, or one for every user. Unknown usernames throw. */
export async function createApiTokens(db: DrizzleDb, target: TokenTarget): Promise<IssuedToken[]> {
  const users = new DrizzleUserRepository(db);
  const tokens = new DrizzleApiTokenRepository(db);

  let recipients: User[];
  if ("all" in target) {
    recipients = await users.list();
  } else {
    const user = await users.getByUsername(target.username);
    if (!user) throw new Error(`User "${target.username}" does not exist`);
    recipients = [user];
  }

  const issued: IssuedToken[] = [];
  for (const user of recipients) {
    issued.push({ username: user.username, token: await tokens.issue(user.id, "cli") });
  }
  return issued;
}

export function parseArgs(argv: string[]): TokenTarget {
  const [arg] = argv;
  if (!arg) throw new Error("Usage: create-api-token <username> | --all");
  return arg === "--all" ? { all: true } : { username: arg };
}

async function main(): Promise<void> {
  const pool = new Pool({ connectionString: config.databaseUrl });
  try {
    const issued = await createApiTokens(createDb(pool), parseArgs(process.argv.slice(2)));
    for (const { username, token } of issued) {
      process.stdout.write(`${username}: ${token}\n`);
    }
    logger.info("API tokens issued", { count: issued.length });
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logger.error("Token creation failed", { err });
    process.exit(1);
  });
}
