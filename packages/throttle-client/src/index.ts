import type { IdentityTokenResponse, ResetResponse, ThrottleStatus } from "@throttle/contracts";
import {
  ErrorBodySchema,
  IdentityTokenResponseSchema,
  ResetResponseSchema,
  ThrottleStatusSchema,
} from "@throttle/contracts";
import type { ZodType } from "zod";

export interface ThrottleAdminClientOptions {
  baseUrl: string;
  controlToken: string;
  fetch?: typeof fetch;
}

export class ThrottleClientError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
  ) {
    super(`Throttle service responded ${status}: ${code}`);
    this.name = "ThrottleClientError";
  }
}

export class ThrottleAdminClient {
  private readonly baseUrl: string;
  private readonly controlToken: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ThrottleAdminClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.controlToken = options.controlToken;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async status(identity: string): Promise<ThrottleStatus> {
    return this.request("GET", `/throttles/${encodeURIComponent(identity)}`, ThrottleStatusSchema);
  }

  async reset(identity: string): Promise<ResetResponse> {
    return this.request("DELETE", `/throttles/${encodeURIComponent(identity)}`, ResetResponseSchema);
  }

  async mintToken(subject: string): Promise<IdentityTokenResponse> {
    return this.request("POST", "/tokens", IdentityTokenResponseSchema, { subject });
  }

  private async request<T>(method: string, path: string, schema: ZodType<T>, body?: unknown): Promise<T> {
    const headers: Record<string, string> = { authorization: `Bearer ${this.controlToken}` };
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const payload: unknown = await response.json().catch(() => undefined);
    if (!response.ok) {
      const parsedError = ErrorBodySchema.safeParse(payload);
      throw new ThrottleClientError(response.status, parsedError.success ? parsedError.data.error : "unknown_error");
    }

    return schema.parse(payload);
  }
}
