import dotenv from "dotenv";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { seedProducts } from "./database/seed.js";
import { InMemoryProductRepository } from "./repositories/product.repository.js";

async function main() {
  dotenv.config();
  const config = loadConfig();

  const productRepository = new InMemoryProductRepository();
  if (config.seedProducts) {
    await seedProducts(productRepository);
  }

  const app = createApp({
    productRepository,
    corsOrigin: config.corsOrigin,
  });

  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
}

process.on("uncaughtException", (error) => {
  console.error("Uncaught Exception:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled Rejection at:", promise, "reason:", reason);
  process.exit(1);
});

main().catch((err) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});
