import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { FileSystemStorage } from '../../utils/fileSystemStorage.js';
import { AuthorizationError, PersistenceError, ValidationError, errorMessage } from '../store/errors.js';
import type { RequestContext, Role } from '../types/records.js';
import { isAdministrator } from './roles.js';

const roleSchema = z.enum(['Administrator', 'Manager', 'Engineer', 'Viewer']);

const accountSchema = z.object({
  password_hash: z.string(),
  role: roleSchema,
  email: z.string(),
  created_at: z.string(),
});

const usersFileSchema = z.record(accountSchema);

export const newUserSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(40, 'Username too long')
    .regex(/^[A-Za-z0-9._-]+$/, 'Username may only contain letters, digits, dot, dash and underscore'),
  password: z.string().min(6, 'Password must be at least 6 characters'),
  role: roleSchema,
  email: z.string().trim().email('Invalid email').or(z.literal('')).default(''),
});

export type UserAccount = z.infer<typeof accountSchema>;
export type NewUser = z.input<typeof newUserSchema>;

export type PublicUser = {
  username: string;
  role: Role;
  email: string;
  created_at: string;
};

const KEY_LENGTH = 32;

export function hashPassword(password: string, salt = randomBytes(16).toString('hex')): string {
  const derived = scryptSync(password, salt, KEY_LENGTH).toString('hex');
  return `scrypt$${salt}$${derived}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, salt, expected] = stored.split('$');
  if (scheme !== 'scrypt' || !salt || !expected) return false;
  const actual = scryptSync(password, salt, KEY_LENGTH);
  const wanted = Buffer.from(expected, 'hex');
  return wanted.length === actual.length && timingSafeEqual(actual, wanted);
}

export type UserStoreOptions = {
  filePath: string;
  adminPassword: string;
  adminEmail?: string;
  now?: () => Date;
};

/**
 * Username -> account mapping kept in a single JSON file. Seeded with an
 * `admin` account the first time the file is missing.
 */
export class UserStore {
  private readonly filePath: string;
  private readonly now: () => Date;
  private users: Record<string, UserAccount>;

  constructor(options: UserStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());

    if (!FileSystemStorage.exists(this.filePath)) {
      this.users = {};
      this.persist({
        admin: {
          password_hash: hashPassword(options.adminPassword),
          role: 'Administrator',
          email: options.adminEmail ?? '',
          created_at: this.now().toISOString(),
        },
      });
      console.log('[auth] Seeded default administrator account "admin"');
    } else {
      this.users = this.read();
    }
  }

  authenticate(username: string, password: string): { username: string; role: Role } | null {
    const account = Object.hasOwn(this.users, username) ? this.users[username] : undefined;
    if (!account || !verifyPassword(password, account.password_hash)) return null;
    return { username, role: account.role };
  }

  get(username: string): PublicUser | null {
    if (!Object.hasOwn(this.users, username)) return null;
    const { role, email, created_at } = this.users[username];
    return { username, role, email, created_at };
  }

  listUsers(): PublicUser[] {
    return Object.entries(this.users).map(([username, { role, email, created_at }]) => ({
      username,
      role,
      email,
      created_at,
    }));
  }

  createUser(input: unknown, ctx: RequestContext): PublicUser {
    if (!isAdministrator(ctx.role)) {
      throw new AuthorizationError('Access denied: only administrators can create users');
    }

    const parsed = newUserSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map(i => i.message).join('; '));
    }

    const { username, password, role, email } = parsed.data;
    if (Object.hasOwn(this.users, username)) {
      throw new ValidationError(`User "${username}" already exists`);
    }

    const account: UserAccount = {
      password_hash: hashPassword(password),
      role,
      email,
      created_at: this.now().toISOString(),
    };
    this.persist({ ...this.users, [username]: account });
    console.log(`[auth] ${ctx.actor} created user "${username}" (${role})`);
    return { username, role, email, created_at: account.created_at };
  }

  private read(): Record<string, UserAccount> {
    let raw: unknown;
    try {
      raw = FileSystemStorage.readJson(this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to read users file: ${errorMessage(error)}`, error);
    }
    const parsed = usersFileSchema.safeParse(raw);
    if (!parsed.success) throw new PersistenceError('Invalid users file');
    return parsed.data;
  }

  private persist(next: Record<string, UserAccount>): void {
    try {
      FileSystemStorage.writeJsonAtomic(this.filePath, next);
    } catch (error) {
      throw new PersistenceError(`Failed to write users file: ${errorMessage(error)}`, error);
    }
    this.users = next;
  }
}
