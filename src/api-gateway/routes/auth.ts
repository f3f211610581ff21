import { FastifyInstance } from "fastify";
import { z } from "zod";
import { generateToken, verifyPrincipalSignature, verifyToken } from "../auth.js";
import { config } from "../../config/index.js";

const loginSchema = z.object({
  principal: z.string().min(1).max(128).transform((p) => p.trim()),
  signature: z.string().optional().default(""),
  message: z.string().optional().default(""),
});

export interface AuthRoutesOptions {
  /** Require a valid signature on login; defaults to production only. */
  verifySignatures?: boolean;
}

export async function authRoutes(
  fastify: FastifyInstance,
  opts: AuthRoutesOptions
): Promise<void> {
  const verifySignatures = opts.verifySignatures ?? config.server.nodeEnv === "production";

  /**
   * POST /auth/login
   * Verify principal ownership via signature and return JWT.
   */
  fastify.post("/auth/login", async (request, reply) => {
    const parsed = loginSchema.safeParse(request.body);
    if (!parsed.success) {
      fastify.log.warn({ issues: parsed.error.issues }, "[auth] login schema validation failed");
      return reply.code(400).send({ error: "Invalid request", details: parsed.error.issues });
    }

    const { principal, signature, message } = parsed.data;

    // Outside production any signature is accepted so local tooling can log in
    if (verifySignatures) {
      if (!verifyPrincipalSignature(principal, message, signature)) {
        return reply.code(401).send({ error: "Invalid signature" });
      }
    }

    const token = generateToken(principal);

    return { token, principal, expiresIn: config.jwt.expiresInSeconds };
  });

  /**
   * POST /auth/verify
   * Check if a JWT is still valid.
   */
  fastify.post("/auth/verify", async (request, reply) => {
    const authHeader = request.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return reply.code(401).send({ error: "No token provided" });
    }

    try {
      const payload = verifyToken(authHeader.slice(7));
      return { valid: true, principal: payload.principal };
    } catch {
      return reply.code(401).send({ error: "Invalid or expired token", valid: false });
    }
  });
}
