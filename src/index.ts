import { getEventBus, initEventBus, shutdownEventBus } from "./event-bus/index.js";
import { StakingEngine, createVaultRuntime } from "./staking-engine/index.js";
import { KeeperBot } from "./keeper/index.js";
import { startApiGateway } from "./api-gateway/server.js";
import { config } from "./config/index.js";

async function main() {
  console.log("=== Dual-Asset Staking Vault ===");
  console.log(`Environment: ${config.server.nodeEnv}`);
  console.log(`Vault owner: ${config.admin.owner}`);

  // Initialize event bus (Redis)
  await initEventBus();
  const eventBus = getEventBus();

  // Initialize services
  const runtime = createVaultRuntime();
  const stakingEngine = new StakingEngine(runtime.vault, eventBus);
  const keeperBot = new KeeperBot(runtime.priceFeed, eventBus);

  await stakingEngine.initialize();
  await keeperBot.initialize();

  // Start API Gateway
  const server = await startApiGateway({ stakingEngine, runtime });

  console.log("=== All services running ===");

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.close();
    await keeperBot.shutdown();
    await stakingEngine.shutdown();
    await shutdownEventBus();
    console.log("Goodbye.");
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
