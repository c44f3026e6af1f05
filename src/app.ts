import express, { ErrorRequestHandler } from "express";
import morgan from "morgan";
import cors from "cors";
import AppError from "./utils/appError";
import type { Config } from "./config/env";
import { createSystemController } from "./controllers/systemController";
import alertRouter from "./routes/alertRoutes";
import alertImageRouter from "./routes/alertImageRoutes";
import { processingResultRouter, processingTaskRouter } from "./routes/taskRoutes";
import type { AlertImageService } from "./services/alertImageService";
import type { AlertService } from "./services/alertService";
import type { ConnectionRegistry } from "./services/connectionRegistry";
import type { DocumentStore } from "./services/documentStore";
import type { TaskDispatcher } from "./services/taskDispatcher";

export interface AppServices {
  store: DocumentStore;
  registry: ConnectionRegistry;
  alerts: AlertService;
  alertImages: AlertImageService;
  dispatcher: TaskDispatcher;
}

//Global error handler
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      status: err.status,
      code: err.code,
      errorMessage: err.message,
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({
      status: "fail",
      code: "invalid_message",
      errorMessage: `Invalid JSON body: ${err.message}`,
    });
    return;
  }

  console.error("[HTTP] Unhandled error:", err);
  res.status(500).json({
    status: "error",
    code: "internal_error",
    errorMessage: "Internal server error",
  });
};

export function createApp(config: Pick<Config, "NODE_ENV" | "CORS_ORIGIN" | "WS_PATH">, services: AppServices) {
  const app = express();

  app.use(cors({
    origin: config.CORS_ORIGIN,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));

  // Parse request body
  app.use(express.json({ limit: "10mb" }));

  if (config.NODE_ENV === "development") {
    app.use(morgan("dev"));
  }

  const { getServiceInfo, getHealth, getStats } = createSystemController(
    services.registry,
    services.store,
    config.WS_PATH
  );

  app.get("/", getServiceInfo);
  app.get("/health", getHealth);
  app.get("/api/v1/stats", getStats);

  app.use("/api/v1/alerts", alertRouter(services.alerts, services.registry));
  app.use("/api/v1/processing-tasks", processingTaskRouter(services.dispatcher));
  app.use("/api/v1/processing-results", processingResultRouter(services.dispatcher));
  app.use("/api/v1/alert-images", alertImageRouter(services.alertImages));

  app.use((req, res, next) => {
    next(new AppError(`Can't find ${req.originalUrl} on this server!`, 404, "not_found"));
  });

  app.use(errorHandler);

  return app;
}
