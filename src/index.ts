// file: src/index.ts
import app from "@/app";
import { bootstrapApplication } from "@/config/bootstrap";
import { connectDB } from "@/config/database.config";
import { env } from "@/env";
import { logger } from "@/middlewares/pino-logger";

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught Exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled Rejection");
  process.exit(1);
});

async function start(): Promise<void> {
  await connectDB();
  await bootstrapApplication();

  const server = app.listen(env.PORT, () => {
    logger.info(`Listening: http://localhost:${env.PORT}`);
  });

  server.on("error", (err) => {
    if ("code" in err && err.code === "EADDRINUSE") {
      logger.fatal(
        `Port ${env.PORT} is already in use. Please choose another port or stop the process using it.`
      );
    } else {
      logger.fatal({ err }, "Failed to start server");
    }
    process.exit(1);
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "Startup failed");
  process.exit(1);
});
