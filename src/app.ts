// file: src/app.ts
import type { Application } from "express";

import cookieParser from "cookie-parser";
import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";

import { env } from "@/env";
import { errorHandler } from "@/middlewares/error-handler.middleware";
import { notFound } from "@/middlewares/not-found.middleware";
import { pinoLogger } from "@/middlewares/pino-logger";
import { apiLimiter } from "@/middlewares/rate-limit.middleware";
import rootRouter from "@/routes/index.route";

const app: Application = express();

app.use(
  cors({
    origin: env.NODE_ENV === "production" ? env.CLIENT_URL : true,
    credentials: true,
  })
);

app.use(express.json({ limit: "100kb" }));
app.use(pinoLogger());
app.use(express.urlencoded({ extended: true }));
app.use(cookieParser());
if (env.NODE_ENV === "development") {
  app.use(morgan("dev"));
}
app.use(helmet());

app.get<object>("/", (_req, res) => {
  res.json({
    message: `${env.APP_NAME} API`,
  });
});

app.use(env.BASE_URL, apiLimiter, rootRouter);

app.use(notFound);
app.use(errorHandler);

export default app;
