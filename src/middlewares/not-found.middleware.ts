// src/middlewares/not-found.middleware.ts
import type { NextFunction, Request, Response } from "express";

import { HTTPSTATUS } from "@/config/http.config";
import { ErrorCodeEnum } from "@/enums/error-code.enum";

export function notFound(req: Request, res: Response, _next: NextFunction) {
  return res.status(HTTPSTATUS.NOT_FOUND).json({
    success: false,
    message: `Route ${req.method} ${req.originalUrl} not found`,
    errorCode: ErrorCodeEnum.RESOURCE_NOT_FOUND,
    requestId: req.id ? String(req.id) : undefined,
    timestamp: new Date().toISOString(),
  });
}
