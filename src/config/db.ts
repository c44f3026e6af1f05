import mongoose from "mongoose";
import type { Config } from "./env";

export default async function connectDB(config: Pick<Config, "MONGODB_URI" | "DATABASE_NAME">) {
  console.log(`[MongoDB] Connecting to ${config.DATABASE_NAME}...`);

  mongoose.connection.on("disconnected", () => {
    console.warn("[MongoDB] Disconnected");
  });
  mongoose.connection.on("reconnected", () => {
    console.log("[MongoDB] Reconnected");
  });
  mongoose.connection.on("error", (err) => {
    console.error("[MongoDB] Connection error:", err);
  });

  await mongoose.connect(config.MONGODB_URI, { dbName: config.DATABASE_NAME });
  console.log(`✓ MongoDB connected: ${mongoose.connection.host}/${mongoose.connection.name}`);

  return mongoose.connection;
}

export async function disconnectDB() {
  await mongoose.disconnect();
  console.log("✓ MongoDB disconnected");
}
