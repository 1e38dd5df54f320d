import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import {
  IdentityTokenRequestSchema,
  type AttemptResponse,
  type ErrorBody,
  type IdentityTokenResponse,
  type ResetResponse,
  type ThrottledError,
} from "@throttle/contracts";
import { assertControlAuth, mintIdentityToken, resolveIdentity } from "./auth.js";
import { CacheError, type Cache } from "./cache.js";
import type { AppConfig } from "./config.js";
import { MemoryCache } from "./memory-cache.js";
import { Throttle } from "./throttle.js";

declare module "fastify" {
  interface FastifyRequest {
    throttleIdentity: string;
  }
}

interface ServerDeps {
  cache?: Cache;
}

interface IdentityParams {
  identity: string;
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 64_000,
    logger: {
      transport: process.env.NODE_ENV === "production" ? undefined : { target: "pino-pretty" },
    },
  });

  app.decorateRequest("throttleIdentity", "");

  const cache: Cache = deps.cache ?? new MemoryCache();
  const windowMs = config.throttleWindowSec * 1000;

  function throttleFor(identity: string): Throttle {
    return new Throttle(identity, config.throttleMaxAttempts, windowMs, config.throttleKeyPrefix);
  }

  function isControlAuthorized(headerValue: string | undefined): boolean {
    try {
      assertControlAuth(headerValue, config.controlAuthToken);
      return true;
    } catch {
      return false;
    }
  }

  async function throttleGuard(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const identity = resolveIdentity(
      { authorization: request.headers.authorization, ip: request.ip },
      config.identityTokenSecret,
    );
    request.throttleIdentity = identity;
    const throttle = throttleFor(identity);
    const status = await throttle.status(cache);

    reply.header("x-ratelimit-limit", status.limit);

    if (!status.allowed) {
      const retryAfterSec = Math.max(1, Math.ceil(status.resetInMs / 1000));
      request.log.warn({ identity, count: status.count, limit: status.limit }, "request throttled");
      reply.header("x-ratelimit-remaining", 0);
      reply.header("retry-after", retryAfterSec);
      const body: ThrottledError = { error: "rate_limited", retryAfterSec };
      return reply.code(429).send(body);
    }

    await throttle.hit(cache);
    reply.header("x-ratelimit-remaining", Math.max(0, status.remaining - 1));
    return undefined;
  }

  if (cache instanceof MemoryCache) {
    const sweepInterval = setInterval(() => {
      const dropped = cache.sweep();
      if (dropped > 0) {
        app.log.debug({ dropped }, "swept expired throttle entries");
      }
    }, Math.max(1000, config.cacheSweepIntervalSec * 1000));

    app.addHook("onClose", async () => {
      clearInterval(sweepInterval);
    });
  }

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof CacheError) {
      request.log.error({ err: error, key: error.key, operation: error.operation }, "throttle cache failure");
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
      const body: ErrorBody = { error: "bad_request", code: error.code, requestId: request.id };
      reply.code(error.statusCode).send(body);
      return;
    } else {
      request.log.error({ err: error }, "unhandled request error");
    }
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    throttleMaxAttempts: config.throttleMaxAttempts,
    throttleWindowSec: config.throttleWindowSec,
    throttleKeyPrefix: config.throttleKeyPrefix,
  }));

  app.post("/attempts", { preHandler: throttleGuard }, async (request): Promise<AttemptResponse> => {
    return { ok: true, identity: request.throttleIdentity };
  });

  app.post("/tokens", async (request, reply) => {
    if (!isControlAuthorized(request.headers.authorization)) {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = IdentityTokenRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const token = mintIdentityToken(
      { subject: parsed.data.subject },
      config.identityTokenSecret,
      config.identityTokenTtlSec,
    );
    const body: IdentityTokenResponse = {
      subject: parsed.data.subject,
      token,
      expiresAtMs: Date.now() + (config.identityTokenTtlSec * 1000),
    };
    return reply.send(body);
  });

  app.get<{ Params: IdentityParams }>("/throttles/:identity", async (request, reply) => {
    if (!isControlAuthorized(request.headers.authorization)) {
      return reply.code(401).send({ error: "unauthorized" });
    }
    return reply.send(await throttleFor(request.params.identity).status(cache));
  });

  app.delete<{ Params: IdentityParams }>("/throttles/:identity", async (request, reply) => {
    if (!isControlAuthorized(request.headers.authorization)) {
      return reply.code(401).send({ error: "unauthorized" });
    }
    const { identity } = request.params;
    await throttleFor(identity).remove(cache);
    request.log.info({ identity }, "throttle reset");
    const body: ResetResponse = { ok: true, identity };
    return reply.send(body);
  });

  return app;
}
