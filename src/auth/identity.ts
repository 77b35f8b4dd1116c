import type { Kysely } from "kysely";
import { sign, verify } from "hono/jwt";
import type { DB } from "../db/kysely.js";
import { AuthenticationError, NotFoundError, ValidationError } from "../errors.js";
import {
  createUser,
  DuplicateUsernameError,
  findUserByUsername,
  getUser,
  listUsers,
  setUserEnabled,
} from "../users/repository.js";
import type { CreateUserInput, Principal, Role, User } from "../users/types.js";

export interface IssuedToken {
  token: string;
  expires_at: string;
}

/**
 * Account directory and bearer-token authority. The task API only reads from
 * it, apart from admin user provisioning.
 */
export interface IdentityProvider {
  authenticate(token: string): Promise<Principal>;
  getUser(id: string): Promise<User | null>;
  listUsers(role?: Role): Promise<User[]>;
  createUser(input: CreateUserInput): Promise<User>;
  disableUser(username: string): Promise<User>;
  issueToken(username: string): Promise<IssuedToken>;
}

export interface LocalIdentityOptions {
  secret: string;
  tokenTtlHours: number;
  now?: () => Date;
}

const ALG = "HS256";

export class LocalIdentityProvider implements IdentityProvider {
  private readonly now: () => Date;

  constructor(
    private db: Kysely<DB>,
    private options: LocalIdentityOptions,
  ) {
    if (options.secret.length === 0) {
      throw new Error("Token secret must not be empty");
    }
    this.now = options.now ?? (() => new Date());
  }

  async authenticate(token: string): Promise<Principal> {
    let payload: Record<string, unknown>;
    try {
      payload = await verify(token, this.options.secret, ALG);
    } catch {
      throw new AuthenticationError();
    }

    if (typeof payload.sub !== "string") {
      throw new AuthenticationError();
    }

    // Re-read the account on every request: tokens outlive role changes and
    // disabled accounts.
    const user = await getUser(this.db, payload.sub);
    if (!user || !user.enabled) {
      throw new AuthenticationError("Account is unknown or disabled");
    }
    return { id: user.id, username: user.username, role: user.role };
  }

  getUser(id: string): Promise<User | null> {
    return getUser(this.db, id);
  }

  listUsers(role?: Role): Promise<User[]> {
    return listUsers(this.db, role);
  }

  async createUser(input: CreateUserInput): Promise<User> {
    try {
      return await createUser(this.db, input, this.now().toISOString());
    } catch (err) {
      if (err instanceof DuplicateUsernameError) {
        throw new ValidationError(err.message);
      }
      throw err;
    }
  }

  async disableUser(username: string): Promise<User> {
    const user = await findUserByUsername(this.db, username);
    if (!user) {
      throw new NotFoundError("User", username);
    }
    const updated = await setUserEnabled(this.db, user.id, false);
    if (!updated) {
      throw new NotFoundError("User", username);
    }
    return updated;
  }

  async issueToken(username: string): Promise<IssuedToken> {
    const user = await findUserByUsername(this.db, username);
    if (!user) {
      throw new NotFoundError("User", username);
    }
    if (!user.enabled) {
      throw new ValidationError(`User '${user.username}' is disabled`);
    }

    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const exp = issuedAt + Math.round(this.options.tokenTtlHours * 3600);
    const token = await sign(
      { sub: user.id, username: user.username, role: user.role, iat: issuedAt, exp },
      this.options.secret,
      ALG,
    );
    return { token, expires_at: new Date(exp * 1000).toISOString() };
  }
}
