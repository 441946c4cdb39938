// file: src/middlewares/error-handler.middleware.ts
import type { ErrorRequestHandler, Request, Response } from "express";

import mongoose from "mongoose";
import { ZodError } from "zod";

import type { HttpStatusCodeType } from "@/config/http.config";
import type { ErrorCodeEnumType } from "@/enums/error-code.enum";

import { HTTPSTATUS } from "@/config/http.config";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { env } from "@/env";
import { AppError } from "@/utils/app-error.utils";

import { logger } from "./pino-logger";

type FieldError = {
  field: string;
  message: string;
  code?: string;
};

type MappedError = {
  statusCode: HttpStatusCodeType;
  message: string;
  errorCode: ErrorCodeEnumType;
  errors?: FieldError[];
};

function send(
  res: Response,
  mapped: MappedError,
  requestId: string | undefined
) {
  return res.status(mapped.statusCode).json({
    success: false,
    message: mapped.message,
    errors: mapped.errors,
    errorCode: mapped.errorCode,
    requestId,
    timestamp: new Date().toISOString(),
  });
}

function readProp(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function formatZodError(error: ZodError): MappedError {
  return {
    statusCode: HTTPSTATUS.BAD_REQUEST,
    message: "Validation failed",
    errorCode: ErrorCodeEnum.VALIDATION_ERROR,
    errors: error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    })),
  };
}

function handleMongoDBError(error: unknown): MappedError | null {
  if (error instanceof mongoose.Error.ValidationError) {
    return {
      statusCode: HTTPSTATUS.BAD_REQUEST,
      message: "Database validation failed",
      errorCode: ErrorCodeEnum.VALIDATION_ERROR,
      errors: Object.values(error.errors).map((err) => ({
        field: err.path,
        message: err.message,
      })),
    };
  }

  // Invalid ObjectId
  if (error instanceof mongoose.Error.CastError) {
    return {
      statusCode: HTTPSTATUS.BAD_REQUEST,
      message: `Invalid ${error.path}: ${String(error.value)}`,
      errorCode: ErrorCodeEnum.VALIDATION_ERROR,
    };
  }

  if (readProp(error, "code") === 11000) {
    const keyPattern = readProp(error, "keyPattern");
    const field =
      typeof keyPattern === "object" && keyPattern !== null
        ? Object.keys(keyPattern)[0]
        : "value";
    return {
      statusCode: HTTPSTATUS.CONFLICT,
      message: `${field} already exists`,
      errorCode: ErrorCodeEnum.RESOURCE_CONFLICT,
    };
  }

  const name = readProp(error, "name");
  if (
    name === "MongoNetworkError" ||
    name === "MongooseServerSelectionError"
  ) {
    return {
      statusCode: HTTPSTATUS.SERVICE_UNAVAILABLE,
      message: "Database connection error",
      errorCode: ErrorCodeEnum.DATABASE_CONNECTION_ERROR,
    };
  }

  return null;
}

// body-parser and http-errors style failures
function handleHttpError(error: unknown): MappedError | null {
  const type = readProp(error, "type");

  if (type === "entity.parse.failed") {
    return {
      statusCode: HTTPSTATUS.BAD_REQUEST,
      message: "Invalid JSON format in request body",
      errorCode: ErrorCodeEnum.VALIDATION_ERROR,
    };
  }

  if (type === "entity.too.large") {
    return {
      statusCode: HTTPSTATUS.PAYLOAD_TOO_LARGE,
      message: "Request body too large",
      errorCode: ErrorCodeEnum.REQUEST_TOO_LARGE,
    };
  }

  if (readProp(error, "status") === HTTPSTATUS.TOO_MANY_REQUESTS) {
    return {
      statusCode: HTTPSTATUS.TOO_MANY_REQUESTS,
      message: "Too many requests, please try again later",
      errorCode: ErrorCodeEnum.AUTH_TOO_MANY_ATTEMPTS,
    };
  }

  return null;
}

function requestIdOf(req: Request): string | undefined {
  if (req.id !== undefined) {
    return String(req.id);
  }
  const header = req.headers["x-request-id"];
  return Array.isArray(header) ? header[0] : header;
}

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req,
  res,
  _next
) => {
  const requestId = requestIdOf(req);
  const err = error instanceof Error ? error : new Error(String(error));

  const context = {
    requestId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    error: {
      name: err.name,
      message: err.message,
      stack: env.NODE_ENV === "development" ? err.stack : undefined,
    },
  };

  if (
    error instanceof AppError &&
    error.statusCode < HTTPSTATUS.INTERNAL_SERVER_ERROR
  ) {
    logger.warn(context, `Request failed on ${req.method} ${req.path}`);
  } else {
    logger.error(context, `Error occurred on ${req.method} ${req.path}`);
  }

  if (error instanceof ZodError) {
    send(res, formatZodError(error), requestId);
    return;
  }

  if (error instanceof AppError) {
    send(
      res,
      {
        statusCode: error.statusCode,
        message: error.message,
        errorCode: error.errorCode ?? ErrorCodeEnum.INTERNAL_SERVER_ERROR,
      },
      requestId
    );
    return;
  }

  const mapped = handleMongoDBError(error) ?? handleHttpError(error);
  if (mapped) {
    send(res, mapped, requestId);
    return;
  }

  res.status(HTTPSTATUS.INTERNAL_SERVER_ERROR).json({
    success: false,
    message:
      env.NODE_ENV === "development"
        ? err.message || "Unknown error occurred"
        : "Internal Server Error",
    errorCode: ErrorCodeEnum.INTERNAL_SERVER_ERROR,
    requestId,
    timestamp: new Date().toISOString(),
    ...(env.NODE_ENV === "development" && { stack: err.stack }),
  });
};
