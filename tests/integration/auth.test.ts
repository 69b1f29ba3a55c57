/**
 * /register, /login and bearer handling through the HTTP layer
 */

import jwt from "jsonwebtoken";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { TEST_SECRET, buildTestApp, signUp, type TestApp } from "../helpers/app";

describe("auth endpoints", () => {
  let t: TestApp;

  beforeEach(() => {
    t = buildTestApp();
  });

  describe("POST /register", () => {
    it("returns the new user's id and email", async () => {
      const res = await request(t.app)
        .post("/register")
        .send({ email: "ada@example.com", password: "correct-horse-battery" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id: 1, email: "ada@example.com" });
    });

    it("answers 400 when the email is taken", async () => {
      const body = { email: "ada@example.com", password: "correct-horse-battery" };
      await request(t.app).post("/register").send(body).expect(200);

      const res = await request(t.app).post("/register").send(body);
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: "Email already registered" });
    });

    it("validates the payload", async () => {
      const res = await request(t.app)
        .post("/register")
        .send({ email: "not-an-email", password: "short" });

      expect(res.status).toBe(400);
      expect(res.body.detail).toBe("Invalid request data");
      expect(res.body.issues.map((i: { path: string }) => i.path).sort()).toEqual([
        "email",
        "password",
      ]);
    });

    it("rejects an unparseable default submission date", async () => {
      const res = await request(t.app).post("/register").send({
        email: "ada@example.com",
        password: "correct-horse-battery",
        default_submission_date: "someday",
      });
      expect(res.status).toBe(400);
    });

    it("reports malformed JSON as a 400", async () => {
      const res = await request(t.app)
        .post("/register")
        .set("Content-Type", "application/json")
        .send('{"email": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: "Malformed request body" });
    });
  });

  describe("POST /login", () => {
    beforeEach(async () => {
      await request(t.app)
        .post("/register")
        .send({ email: "ada@example.com", password: "correct-horse-battery" })
        .expect(200);
    });

    it("issues a bearer token for form credentials", async () => {
      const res = await request(t.app)
        .post("/login")
        .type("form")
        .send({ username: "ada@example.com", password: "correct-horse-battery" });

      expect(res.status).toBe(200);
      expect(res.body.token_type).toBe("bearer");

      const payload = jwt.verify(res.body.access_token, TEST_SECRET);
      if (typeof payload === "string") throw new Error("unexpected string payload");
      expect(payload.sub).toBe("ada@example.com");
    });

    it("also accepts JSON credentials", async () => {
      await request(t.app)
        .post("/login")
        .send({ username: "ada@example.com", password: "correct-horse-battery" })
        .expect(200);
    });

    it("gives identical 401s for a wrong password and an unknown email", async () => {
      const wrongPassword = await request(t.app)
        .post("/login")
        .type("form")
        .send({ username: "ada@example.com", password: "wrong-password" });
      const unknownEmail = await request(t.app)
        .post("/login")
        .type("form")
        .send({ username: "nobody@example.com", password: "correct-horse-battery" });

      expect(wrongPassword.status).toBe(401);
      expect(unknownEmail.status).toBe(401);
      expect(wrongPassword.body).toEqual({ detail: "Invalid credentials" });
      expect(unknownEmail.body).toEqual(wrongPassword.body);
      expect(wrongPassword.headers["www-authenticate"]).toBe("Bearer");
    });
  });

  describe("bearer tokens", () => {
    it("rejects requests without a token", async () => {
      const res = await request(t.app).get("/rfps");
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ detail: "Not authenticated" });
    });

    it("rejects a non-bearer Authorization header", async () => {
      const res = await request(t.app).get("/rfps").set("Authorization", "Basic YWRhOnB3");
      expect(res.status).toBe(401);
    });

    it("rejects an expired token on every authenticated endpoint", async () => {
      await signUp(t, "ada@example.com");
      const { token } = t.tokens.issue(
        "ada@example.com",
        new Date(Date.now() - 61 * 60 * 1000)
      );
      const auth = `Bearer ${token}`;

      const responses = await Promise.all([
        request(t.app).get("/rfps").set("Authorization", auth),
        request(t.app).get("/rfp/1").set("Authorization", auth),
        request(t.app)
          .put("/rfp/1")
          .set("Authorization", auth)
          .send({
            draft_text: "x",
            company_name: "x",
            document_type: "x",
            submission_date: "2025-01-01",
          }),
        request(t.app).post("/generate-draft/1").set("Authorization", auth),
        request(t.app)
          .post("/upload-rfp")
          .set("Authorization", auth)
          .field("title", "x")
          .attach("file", Buffer.from("x"), "x.pdf"),
      ]);

      for (const res of responses) {
        expect(res.status).toBe(401);
        expect(res.body).toEqual({ detail: "Could not validate credentials" });
      }
    });

    it("accepts a fresh token", async () => {
      const auth = await signUp(t, "ada@example.com");
      const res = await request(t.app).get("/rfps").set("Authorization", auth);
      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });
  });
});
