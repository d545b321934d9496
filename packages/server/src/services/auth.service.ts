import { createHash, randomBytes } from 'node:crypto';
import type { Database } from 'better-sqlite3';
import type { User } from '@showdesk/shared';
import { UserRepository } from '../repositories/index.js';
import { ConflictError } from '../types/errors.js';

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export function generateToken(): string {
  return randomBytes(32).toString('hex');
}

export interface CreatedUser {
  user: User;
  token: string;
}

export class AuthService {
  private userRepo: UserRepository;

  constructor(db: Database) {
    this.userRepo = new UserRepository(db);
  }

  /**
   * Create a user with a fresh API token. Only the token's hash is stored,
   * so the returned token cannot be recovered later.
   */
  createUser(email: string, name: string): CreatedUser {
    if (this.userRepo.findByEmail(email)) {
      throw new ConflictError(`A user with email ${email} already exists`);
    }
    const token = generateToken();
    const user = this.userRepo.create({ email, name, api_token_hash: hashToken(token) });
    return { user, token };
  }

  authenticate(token: string): User | null {
    if (token === '') {
      return null;
    }
    return this.userRepo.findByTokenHash(hashToken(token));
  }
}
