import { parseArgs } from 'node:util';
import { error as logError } from 'firebase-functions/logger';
import { closeDatabase, initializeDatabase } from '../db/index.js';
import { AuthService } from '../services/auth.service.js';

/**
 * Create a user and print their API token. The token is shown once;
 * only its hash is stored.
 *
 *   npm run create-user -- --email host@example.com --name "Host"
 */
function main(): void {
  const { values } = parseArgs({
    options: {
      email: { type: 'string' },
      name: { type: 'string' },
    },
  });

  const email = values.email?.trim();
  const name = values.name?.trim();
  if (!email || !name) {
    throw new Error('Usage: create-user --email <email> --name <name>');
  }

  const db = initializeDatabase();
  try {
    const { user, token } = new AuthService(db).createUser(email, name);
    process.stdout.write(`Created user ${String(user.id)} <${user.email}>\n`);
    process.stdout.write(`API token: ${token}\n`);
  } finally {
    closeDatabase();
  }
}

try {
  main();
} catch (err) {
  logError('create-user failed', { message: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
}
