import type { DbPool } from "../../db/pool.js";
import type { UserRegistration } from "./user-registration.js";

import { ensureSchema } from "../../db/pool.js";
import { BusinessRuleViolationError } from "../../shared/errors.js";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

export interface RegistrationRepository {
  ensureSchema(): Promise<void>;
  add(registration: UserRegistration): Promise<void>;
  countByLogin(login: string): Promise<number>;
  close?(): Promise<void>;
}

export class InMemoryRegistrationRepository implements RegistrationRepository {
  private readonly registrations = new Map<string, UserRegistration>();

  async ensureSchema() {}

  async add(registration: UserRegistration) {
    this.registrations.set(registration.id, { ...registration });
  }

  async countByLogin(login: string) {
    const normalized = login.toLowerCase();
    return [...this.registrations.values()].filter((item) => item.login.toLowerCase() === normalized).length;
  }
}

export class PostgresRegistrationRepository implements RegistrationRepository {
  constructor(private readonly pool: DbPool) {}

  async ensureSchema() {
    await ensureSchema(this.pool, [
      "create schema if not exists users",
      `create table if not exists users.user_registrations (
         id uuid primary key,
         login text not null,
         encrypted_email text not null,
         first_name text not null,
         last_name text not null,
         registered_at timestamptz not null,
         status text not null
       )`,
      "create unique index if not exists user_registrations_login_idx on users.user_registrations (lower(login))",
    ]);
  }

  async add(registration: UserRegistration) {
    try {
      await this.pool.query(
        `insert into users.user_registrations
           (id, login, encrypted_email, first_name, last_name, registered_at, status)
         values ($1, $2, $3, $4, $5, $6, $7)`,
        [
          registration.id,
          registration.login,
          registration.encryptedEmail,
          registration.firstName,
          registration.lastName,
          registration.registeredAt,
          registration.status,
        ],
      );
    } catch (error) {
      // two registrations raced past the countByLogin check
      if (isUniqueViolation(error)) {
        throw new BusinessRuleViolationError("UserLoginMustBeUnique", `Login ${registration.login} is already taken`);
      }
      throw error;
    }
  }

  async countByLogin(login: string) {
    const result = await this.pool.query(
      "select count(*)::int as total from users.user_registrations where lower(login) = lower($1)",
      [login],
    );
    return Number(result.rows[0]?.total ?? 0);
  }

  async close() {
    await this.pool.end();
  }
}
