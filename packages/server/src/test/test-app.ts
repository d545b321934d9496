import type { Express } from 'express';
import type Database from 'better-sqlite3';
import type { User } from '@showdesk/shared';
import { createApp } from '../app.js';
import { openDatabase, setTestDatabase } from '../db/index.js';
import { AuthService, resetServices } from '../services/index.js';

export interface TestContext {
  app: Express;
  db: Database.Database;
}

export interface TestUser {
  user: User;
  token: string;
  /** Value for the Authorization header. */
  auth: string;
}

/**
 * A fresh in-memory database with every migration applied.
 */
export function createTestDatabase(): Database.Database {
  return openDatabase(':memory:');
}

export function setupTestApp(): TestContext {
  // Reset service singletons so they bind to the fresh database
  resetServices();

  const db = createTestDatabase();
  setTestDatabase(db);

  return { app: createApp(), db };
}

export function teardownTestApp(ctx: TestContext): void {
  setTestDatabase(null);
  resetServices();
  ctx.db.close();
}

export function createTestUser(
  db: Database.Database,
  email = 'host@example.com',
  name = 'Test Host'
): TestUser {
  const { user, token } = new AuthService(db).createUser(email, name);
  return { user, token, auth: `Bearer ${token}` };
}
