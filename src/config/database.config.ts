// file: src/config/database.config.ts
import mongoose from "mongoose";
import { setTimeout as delay } from "node:timers/promises";

import { env } from "@/env";
import { logger } from "@/middlewares/pino-logger";

async function connectDB(retries = 3, retryDelay = 5000): Promise<void> {
  mongoose.connection.on("connected", () => {
    logger.info("Mongoose connected to DB");
  });

  mongoose.connection.on("error", (err) => {
    logger.error({ err }, "Mongoose connection error");
  });

  mongoose.connection.on("disconnected", () => {
    logger.warn("Mongoose disconnected from DB");
  });

  process.once("SIGINT", () => {
    mongoose.connection
      .close()
      .then(() => {
        logger.info("Mongoose connection closed due to app termination");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Failed to close Mongoose connection");
        process.exit(1);
      });
  });

  for (let attempt = 1; ; attempt++) {
    try {
      await mongoose.connect(env.MONGO_URI);
      return;
    } catch (error) {
      if (attempt >= retries) {
        logger.error({ err: error }, "Error connecting to MongoDB database");
        throw error;
      }
      logger.warn(
        `Attempt ${attempt} failed. Retrying in ${retryDelay / 1000} seconds...`
      );
      await delay(retryDelay);
    }
  }
}

export { connectDB };
