import { ConflictError, UnauthorizedError } from "../../../lib/errors";
import { logger } from "../../../lib/logger";
import type { PasswordHasher } from "../lib/passwords";
import type { TokenService } from "../lib/tokens";
import type { AuthUser, UserRow } from "../types";
import type { UserRepository } from "./userRepository";

export type RegisterInput = {
  email: string;
  password: string;
  default_company_name?: string | null;
  default_document_type?: string | null;
  default_submission_date?: string | null;
};

export type LoginResult = {
  access_token: string;
  token_type: "bearer";
  expires_at: string;
};

type AuthServiceDeps = {
  users: UserRepository;
  hasher: PasswordHasher;
  tokens: TokenService;
};

function toAuthUser(row: UserRow): AuthUser {
  const { hashed_password: _omit, ...rest } = row;
  return rest;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(input: RegisterInput): Promise<{ id: number; email: string }> {
    const email = normalizeEmail(input.email);

    const existing = await this.deps.users.findByEmail(email);
    if (existing) {
      throw new ConflictError("Email already registered");
    }

    const created = await this.deps.users.create({
      email,
      hashed_password: await this.deps.hasher.hash(input.password),
      default_company_name: input.default_company_name,
      default_document_type: input.default_document_type,
      default_submission_date: input.default_submission_date,
    });

    // Lost a race with a concurrent registration of the same address
    if (!created) {
      throw new ConflictError("Email already registered");
    }

    logger.info("User registered", { user_id: created.id });
    return { id: created.id, email: created.email };
  }

  async login(emailInput: string, password: string): Promise<LoginResult> {
    const user = await this.deps.users.findByEmail(normalizeEmail(emailInput));

    const valid =
      user !== null &&
      user.is_active &&
      (await this.deps.hasher.verify(password, user.hashed_password));

    if (!user || !valid) {
      throw new UnauthorizedError("Invalid credentials");
    }

    const issued = this.deps.tokens.issue(user.email);
    return {
      access_token: issued.token,
      token_type: "bearer",
      expires_at: issued.expiresAt.toISOString(),
    };
  }

  async authenticate(token: string): Promise<AuthUser> {
    const email = this.deps.tokens.verify(token);
    const user = await this.deps.users.findByEmail(email);
    if (!user || !user.is_active) {
      throw new UnauthorizedError();
    }
    return toAuthUser(user);
  }
}
