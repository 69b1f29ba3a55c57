import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictError, UnauthorizedError } from "../../../src/lib/errors";
import type { PasswordHasher } from "../../../src/modules/auth/lib/passwords";
import { createTokenService } from "../../../src/modules/auth/lib/tokens";
import { AuthService } from "../../../src/modules/auth/services/authService";
import { MemoryUserRepository } from "../../helpers/memory";

// reversible stand-in so these tests don't pay for bcrypt
const plainHasher: PasswordHasher = {
  hash: async (plain) => `hashed:${plain}`,
  verify: async (plain, hashed) => hashed === `hashed:${plain}`,
};

describe("AuthService", () => {
  let users: MemoryUserRepository;
  let auth: AuthService;
  const tokens = createTokenService({
    secret: "test-secret-test-secret-test-secret",
    ttlMinutes: 60,
  });

  beforeEach(() => {
    users = new MemoryUserRepository();
    auth = new AuthService({ users, hasher: plainHasher, tokens });
  });

  describe("register", () => {
    it("stores a hash, never the password", async () => {
      const created = await auth.register({ email: "ada@example.com", password: "pw-12345678" });

      expect(created).toEqual({ id: 1, email: "ada@example.com" });
      expect(users.rows.get("ada@example.com")?.hashed_password).toBe("hashed:pw-12345678");
    });

    it("normalizes email case and whitespace", async () => {
      const created = await auth.register({ email: "  Ada@Example.COM ", password: "pw-12345678" });
      expect(created.email).toBe("ada@example.com");
    });

    it("keeps caller-supplied defaults", async () => {
      await auth.register({
        email: "ada@example.com",
        password: "pw-12345678",
        default_company_name: "Analytical Engines Ltd",
        default_document_type: "White Paper",
        default_submission_date: "2025-09-01",
      });

      const row = users.rows.get("ada@example.com");
      expect(row?.default_company_name).toBe("Analytical Engines Ltd");
      expect(row?.default_document_type).toBe("White Paper");
      expect(row?.default_submission_date).toBe("2025-09-01");
    });

    it("rejects a duplicate email", async () => {
      await auth.register({ email: "ada@example.com", password: "pw-12345678" });
      await expect(
        auth.register({ email: "ADA@example.com", password: "other-password" })
      ).rejects.toThrow(new ConflictError("Email already registered"));
    });

    it("reports a lost insert race as a conflict", async () => {
      vi.spyOn(users, "create").mockResolvedValueOnce(null);
      await expect(
        auth.register({ email: "ada@example.com", password: "pw-12345678" })
      ).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe("login", () => {
    beforeEach(async () => {
      await auth.register({ email: "ada@example.com", password: "pw-12345678" });
    });

    it("issues a bearer token whose subject is the email", async () => {
      const result = await auth.login("ada@example.com", "pw-12345678");

      expect(result.token_type).toBe("bearer");
      expect(tokens.verify(result.access_token)).toBe("ada@example.com");
    });

    it("fails the same way for a wrong password and an unknown email", async () => {
      const wrongPassword = auth.login("ada@example.com", "nope-nope");
      const unknownEmail = auth.login("bob@example.com", "pw-12345678");

      await expect(wrongPassword).rejects.toThrow(new UnauthorizedError("Invalid credentials"));
      await expect(unknownEmail).rejects.toThrow(new UnauthorizedError("Invalid credentials"));
    });

    it("refuses inactive users", async () => {
      const row = users.rows.get("ada@example.com");
      if (row) row.is_active = false;

      await expect(auth.login("ada@example.com", "pw-12345678")).rejects.toBeInstanceOf(
        UnauthorizedError
      );
    });
  });

  describe("authenticate", () => {
    it("resolves a token to the user without the password hash", async () => {
      await auth.register({ email: "ada@example.com", password: "pw-12345678" });
      const { access_token } = await auth.login("ada@example.com", "pw-12345678");

      const user = await auth.authenticate(access_token);
      expect(user).toEqual({
        id: 1,
        email: "ada@example.com",
        default_company_name: null,
        default_document_type: "Proposal",
        default_submission_date: null,
        is_active: true,
      });
    });

    it("rejects a valid token for an unknown subject", async () => {
      const { token } = tokens.issue("ghost@example.com");
      await expect(auth.authenticate(token)).rejects.toBeInstanceOf(UnauthorizedError);
    });
  });
});
