import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { config } from "../config/index.js";
import { StakingEngine, type VaultRuntime } from "../staking-engine/index.js";
import { authRoutes } from "./routes/auth.js";
import { vaultRoutes } from "./routes/vault.js";
import { adminRoutes } from "./routes/admin.js";
import { faucetRoutes } from "./routes/faucet.js";

export interface GatewayDeps {
  stakingEngine: StakingEngine;
  /** In-memory custody; the faucet is mounted outside production when given. */
  runtime?: VaultRuntime;
}

export interface GatewayOptions {
  logger?: boolean;
  rateLimitMax?: number;
  verifySignatures?: boolean;
}

export async function buildApiGateway(
  deps: GatewayDeps,
  options: GatewayOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? true });

  await fastify.register(cors, { origin: true });
  await fastify.register(rateLimit, {
    max: options.rateLimitMax ?? 500,
    timeWindow: "1 minute",
  });

  // Decorate request with principal field for auth
  fastify.decorateRequest("principal", "");

  // Health check
  fastify.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // Auth routes (public)
  await fastify.register(authRoutes, {
    verifySignatures: options.verifySignatures,
    prefix: "/api",
  });

  // Ledger operations (JWT) and public reads
  await fastify.register(vaultRoutes, {
    stakingEngine: deps.stakingEngine,
    prefix: "/api",
  });

  // Owner operations (JWT, owner enforced by the vault)
  await fastify.register(adminRoutes, {
    stakingEngine: deps.stakingEngine,
    prefix: "/api",
  });

  if (deps.runtime && config.server.nodeEnv !== "production") {
    await fastify.register(faucetRoutes, { runtime: deps.runtime, prefix: "/api" });
  }

  return fastify;
}

export async function startApiGateway(deps: GatewayDeps): Promise<FastifyInstance> {
  const fastify = await buildApiGateway(deps);

  await fastify.listen({ port: config.server.port, host: config.server.host });
  console.log(`[API Gateway] Listening on port ${config.server.port}`);

  return fastify;
}
