// file: src/middlewares/pino-logger.ts

import dayjs from "dayjs";
import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import pino from "pino";
import pinoHttp from "pino-http";
import pretty from "pino-pretty";

import { env } from "@/env";

const logger = pino(
  {
    level: env.LOG_LEVEL || "info",
    timestamp: () => `,"time":"${dayjs().format("YYYY-MM-DD HH:mm:ss")}"`,
  },
  env.NODE_ENV === "production" ? undefined : pretty({ sync: true })
);

function genReqId(req: IncomingMessage, res: ServerResponse) {
  const header = req.headers["x-request-id"];
  const existingID = req.id ?? (Array.isArray(header) ? header[0] : header);
  if (existingID) return existingID;
  const id = randomUUID();
  res.setHeader("X-Request-Id", id);
  return id;
}

function pinoLogger() {
  return pinoHttp({
    logger,
    genReqId,
    autoLogging: env.NODE_ENV !== "test",
  });
}

export { logger, pinoLogger };
