import dotenv from "dotenv";

dotenv.config();

function requireEnv(key: string, fallback?: string): string {
  const value = process.env[key] ?? fallback;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

const WAD = BigInt(10) ** BigInt(18);
const DAY_SECONDS = BigInt(24 * 60 * 60);

export const config = {
  price: {
    // Static feed answer (8 decimals) used when PRICE_API_URL is unset
    staticAnswer: BigInt(requireEnv("STATIC_PRICE_ANSWER", "200000000000")), // $2000.00000000
    staticDecimals: parseInt(requireEnv("STATIC_PRICE_DECIMALS", "8"), 10),
    apiUrl: process.env["PRICE_API_URL"] ?? "",
  },

  server: {
    port: parseInt(requireEnv("PORT", "3001"), 10),
    host: requireEnv("HOST", "0.0.0.0"),
    nodeEnv: requireEnv("NODE_ENV", "development"),
  },

  redis: {
    url: requireEnv("REDIS_URL", "redis://localhost:6379"),
  },

  admin: {
    owner: requireEnv("VAULT_OWNER", "owner"),
    vaultAddress: requireEnv("VAULT_ADDRESS", "vault"),
  },

  jwt: {
    secret: requireEnv("JWT_SECRET", "vault-dev-jwt-secret-change-in-production"),
    expiresInSeconds: parseInt(requireEnv("JWT_EXPIRES_IN_SECONDS", "86400"), 10), // 24h
  },

  protocol: {
    basisPoints: BigInt(10_000),
    stakeRateBps: BigInt(requireEnv("STAKE_RATE_BPS", "5000")), // 50% over one reward duration
    depositorRateBps: BigInt(requireEnv("DEPOSITOR_RATE_BPS", "1000")), // 10% over one reward duration
    rewardDuration: DAY_SECONDS * BigInt(200),
    cooldown: DAY_SECONDS,

    // Native bounds are USD-valued; token bounds are raw token units (1:1 USD)
    minDeposit: BigInt(100) * WAD,
    maxDeposit: BigInt(1_000_000) * WAD,
    minDepositToken: BigInt(100) * WAD,
    maxDepositToken: BigInt(1_000_000) * WAD,
    minStake: BigInt(100) * WAD,
    maxStake: BigInt(500_000) * WAD,

    priceDeviationBps: BigInt(200), // 2%
    keeperCron: requireEnv("KEEPER_CRON", "*/5 * * * *"),
  },
} as const;

export type Config = typeof config;

export type ProtocolParams = Config["protocol"];
