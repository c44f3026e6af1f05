process.on("uncaughtException", (err) => {
  console.log("UNCAUGHT EXCEPTION! shutting down! 🤯");
  console.log(err.name, err.message);
  process.exit(1);
});

import "dotenv/config";
import { createApp } from "./app";
import connectDB, { disconnectDB } from "./config/db";
import { loadConfig } from "./config/env";
import { AlertImageService } from "./services/alertImageService";
import { AlertService } from "./services/alertService";
import { ChangeFeedBridge } from "./services/changeFeedBridge";
import { ConnectionRegistry } from "./services/connectionRegistry";
import { MessageRouter } from "./services/messageRouter";
import { MongoDocumentStore } from "./services/mongoDocumentStore";
import { TaskDispatcher } from "./services/taskDispatcher";
import { WebSocketServer } from "./services/websocketServer";

// Initialize services
async function initializeServices() {
  try {
    const config = loadConfig();

    // Connect to MongoDB
    await connectDB(config);

    const store = new MongoDocumentStore();
    const alerts = new AlertService({ store });
    const alertImages = new AlertImageService({ store });
    const registry = new ConnectionRegistry({
      snapshotSize: config.SNAPSHOT_SIZE,
      loadSnapshot: (limit) => alerts.recentAlerts(limit),
    });
    const dispatcher = new TaskDispatcher({ store, registry });
    const router = new MessageRouter({ registry, alerts, alertImages, dispatcher });
    const bridge = new ChangeFeedBridge({
      store,
      registry,
      dispatcher,
      retryDelayMs: config.CHANGE_FEED_RETRY_MS,
      maxRetryDelayMs: config.CHANGE_FEED_MAX_RETRY_MS,
    });
    const websocketServer = new WebSocketServer({
      registry,
      router,
      dispatcher,
      path: config.WS_PATH,
      corsOrigin: config.CORS_ORIGIN,
    });

    const app = createApp(config, { store, registry, alerts, alertImages, dispatcher });

    // Start HTTP server
    const server = app.listen(config.PORT, () => {
      console.log(`✓ Server running on PORT: ${config.PORT}`);
    });

    // Initialize WebSocket server (must be after HTTP server starts)
    websocketServer.initialize(server);

    bridge.start();

    console.log("=".repeat(60));
    console.log("✓ All services initialized successfully");
    console.log(`  - MongoDB: Connected (${config.DATABASE_NAME})`);
    console.log("  - Change feed: Watching");
    console.log(`  - WebSocket: Running at ${config.WS_PATH}`);
    console.log("  - HTTP API: Running at http://localhost:" + config.PORT + "/api/v1");
    console.log("=".repeat(60));

    let shuttingDown = false;

    // Graceful shutdown handlers
    const gracefulShutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\n${signal} received. Starting graceful shutdown...`);

      // Force exit if graceful shutdown takes too long
      setTimeout(() => {
        console.error("Forceful shutdown due to timeout");
        process.exit(1);
      }, config.SHUTDOWN_TIMEOUT_MS).unref();

      try {
        await bridge.stop();

        // Closes client sockets and the HTTP server it is attached to
        await websocketServer.shutdown();

        await disconnectDB();

        console.log("✓ HTTP server closed");
        process.exit(0);
      } catch (error) {
        console.error("Error during shutdown:", error);
        process.exit(1);
      }
    };

    // Handle shutdown signals
    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

    // Handle unhandled rejections
    process.on("unhandledRejection", (err) => {
      console.log("UNHANDLED REJECTION! shutting down! 🤯");
      console.log(err);
      void gracefulShutdown("UNHANDLED_REJECTION");
    });

  } catch (error) {
    console.error("Failed to initialize services:", error);
    process.exit(1);
  }
}

// Start the application
void initializeServices();
