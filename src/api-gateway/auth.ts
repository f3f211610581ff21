import type { FastifyReply, FastifyRequest } from "fastify";
import jwt from "jsonwebtoken";
import { ethers } from "ethers";
import { config } from "../config/index.js";

declare module "fastify" {
  interface FastifyRequest {
    principal: string;
  }
}

export interface JwtPayload {
  principal: string;
  iat: number;
  exp: number;
}

/**
 * Generate a JWT for a principal.
 * Called after signature verification.
 */
export function generateToken(principal: string): string {
  return jwt.sign({ principal }, config.jwt.secret, {
    expiresIn: config.jwt.expiresInSeconds,
  });
}

/**
 * Verify a JWT and return the payload.
 */
export function verifyToken(token: string): JwtPayload {
  const decoded = jwt.verify(token, config.jwt.secret);
  if (
    typeof decoded === "string" ||
    typeof decoded["principal"] !== "string" ||
    decoded.iat === undefined ||
    decoded.exp === undefined
  ) {
    throw new Error("Malformed token payload");
  }
  return { principal: decoded["principal"], iat: decoded.iat, exp: decoded.exp };
}

/**
 * Check a personal_sign signature: the principal is the signer's address.
 */
export function verifyPrincipalSignature(principal: string, message: string, signature: string): boolean {
  try {
    const recovered = ethers.verifyMessage(message, signature);
    return recovered.toLowerCase() === principal.toLowerCase();
  } catch {
    return false;
  }
}

/**
 * Fastify preHandler hook that requires a valid JWT.
 * Attaches `request.principal` for downstream use.
 */
export async function requireAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  const authHeader = request.headers.authorization;

  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return reply.code(401).send({ error: "Missing or invalid Authorization header" });
  }

  const token = authHeader.slice(7);

  try {
    const payload = verifyToken(token);
    request.principal = payload.principal;
  } catch {
    return reply.code(401).send({ error: "Invalid or expired token" });
  }
}
