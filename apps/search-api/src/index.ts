import { loadEnv } from "./env.js";
import { buildServer } from "./server.js";

/**
 * Start the server
 */
async function start() {
  const env = loadEnv();
  const port = env.PORT;
  const host = "0.0.0.0";

  try {
    const server = await buildServer(env);
    await server.listen({ port, host });

    server.log.info({ port, env: env.NODE_ENV }, "Search API listening");
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
  process.exit(1);
});

void start();
