import jwt from "jsonwebtoken";
import { IdentityTokenClaimsSchema, type IdentityTokenClaims } from "@throttle/contracts";

export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const [scheme, token] = (headerValue ?? "").split(" ");
  if (scheme !== "Bearer" || token !== expectedToken) {
    throw new Error("Unauthorized");
  }
}

export function mintIdentityToken(claims: IdentityTokenClaims, secret: string, expiresInSec: number): string {
  return jwt.sign(claims, secret, {
    algorithm: "HS256",
    expiresIn: expiresInSec,
  });
}

export function verifyIdentityToken(token: string, secret: string): IdentityTokenClaims {
  const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  if (typeof decoded !== "object" || decoded === null) {
    throw new Error("Invalid identity token");
  }
  const parsed = IdentityTokenClaimsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error("Invalid identity claims");
  }
  return parsed.data;
}

// A verified identity token throttles per user; anything else throttles per address.
export function resolveIdentity(request: { authorization: string | undefined; ip: string }, secret: string): string {
  const [scheme, token] = (request.authorization ?? "").split(" ");
  if (scheme === "Bearer" && token) {
    try {
      return `user:${verifyIdentityToken(token, secret).subject}`;
    } catch {
      return `ip:${request.ip}`;
    }
  }
  return `ip:${request.ip}`;
}
