import "dotenv/config";
import { loadConfig } from "./src/config.js";
import { createApp } from "./src/app.js";
import { ModelAiGateway } from "./src/ai/gateway.js";
import { GeminiModelClient } from "./src/ai/model-client.js";
import { GenerationLog } from "./src/store/generation-log.js";
import { TaskStore } from "./src/store/task-store.js";

function start() {
  try {
    const config = loadConfig();
    if (!config.model.apiKey) {
      console.warn("WARNING: MODEL_API_KEY not set. AI endpoints will answer with upstream errors.");
    }

    const app = createApp({
      config,
      gateway: new ModelAiGateway(new GeminiModelClient(config.model)),
      store: new TaskStore(),
      log: new GenerationLog(config.generationLogLimit),
    });

    const server = app.listen(config.port, () => {
      console.log(`Rehab Dashboard API running on port ${config.port}`);
    });

    // Graceful shutdown handling
    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      server.close((err) => {
        if (err) {
          console.error("Error closing HTTP server:", err);
          process.exit(1);
        }
        console.log("HTTP server closed.");
        process.exit(0);
      });

      // Force close after 10 seconds
      setTimeout(() => {
        console.error("Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (err) {
    console.error("Failed to start:", err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

start();
