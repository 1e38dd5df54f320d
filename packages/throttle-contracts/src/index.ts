import { z } from "zod";

export const ThrottleStatusSchema = z.object({
  identity: z.string(),
  key: z.string(),
  count: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  allowed: z.boolean(),
  resetInMs: z.number().nonnegative(),
});

export const ErrorCodeSchema = z.enum([
  "unauthorized",
  "invalid_request",
  "rate_limited",
  "bad_request",
  "internal_error",
]);

export const ErrorBodySchema = z.object({
  error: ErrorCodeSchema,
  // Framework error code, set alongside "bad_request".
  code: z.string().optional(),
  requestId: z.string().optional(),
  details: z.unknown().optional(),
});

export const ThrottledErrorSchema = z.object({
  error: z.literal("rate_limited"),
  retryAfterSec: z.number().int().positive(),
});

export const IdentityTokenClaimsSchema = z.object({
  subject: z.string().min(1),
});

export const IdentityTokenRequestSchema = z.object({
  subject: z.string().min(1).max(256),
});

export const IdentityTokenResponseSchema = z.object({
  subject: z.string(),
  token: z.string().min(1),
  expiresAtMs: z.number().int().nonnegative(),
});

export const ResetResponseSchema = z.object({
  ok: z.literal(true),
  identity: z.string(),
});

export const AttemptResponseSchema = z.object({
  ok: z.literal(true),
  identity: z.string(),
});

export type ThrottleStatus = z.infer<typeof ThrottleStatusSchema>;
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;
export type ErrorBody = z.infer<typeof ErrorBodySchema>;
export type ThrottledError = z.infer<typeof ThrottledErrorSchema>;
export type IdentityTokenClaims = z.infer<typeof IdentityTokenClaimsSchema>;
export type IdentityTokenRequest = z.infer<typeof IdentityTokenRequestSchema>;
export type IdentityTokenResponse = z.infer<typeof IdentityTokenResponseSchema>;
export type ResetResponse = z.infer<typeof ResetResponseSchema>;
export type AttemptResponse = z.infer<typeof AttemptResponseSchema>;
