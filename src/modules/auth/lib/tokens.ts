import jwt from "jsonwebtoken";
import { UnauthorizedError } from "../../../lib/errors";

const ALGORITHM = "HS256";

export type IssuedToken = {
  token: string;
  expiresAt: Date;
};

export interface TokenService {
  issue(email: string, now?: Date): IssuedToken;
  /** Returns the subject (email) of a valid, unexpired token. */
  verify(token: string): string;
}

export function createTokenService(opts: {
  secret: string;
  ttlMinutes: number;
}): TokenService {
  return {
    issue(email, now = new Date()) {
      const exp = Math.floor(now.getTime() / 1000) + opts.ttlMinutes * 60;
      const token = jwt.sign({ sub: email, exp }, opts.secret, {
        algorithm: ALGORITHM,
      });
      return { token, expiresAt: new Date(exp * 1000) };
    },

    verify(token) {
      let payload: string | jwt.JwtPayload;
      try {
        payload = jwt.verify(token, opts.secret, { algorithms: [ALGORITHM] });
      } catch {
        // expired, bad signature, malformed: all the same to the caller
        throw new UnauthorizedError();
      }

      if (typeof payload === "string" || typeof payload.sub !== "string") {
        throw new UnauthorizedError();
      }
      return payload.sub;
    },
  };
}
