import type { Request, Response } from "express";

import { asyncHandler } from "@/middlewares/async-handler.middleware";
import { ApiResponse } from "@/utils/response.utils";
import { zParse } from "@/utils/validators.utils";

import {
  createCleaningServiceSchema,
  serviceIdParamSchema,
  updateCleaningServiceSchema,
} from "./cleaning-service.schema";
import { CleaningServiceService } from "./cleaning-service.service";

export class CleaningServiceController {
  private service: CleaningServiceService;

  constructor() {
    this.service = new CleaningServiceService();
  }

  createService = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(createCleaningServiceSchema, req);
    const result = await this.service.createService(validated.body);
    ApiResponse.created(res, result, "Service created successfully");
  });

  updateService = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(updateCleaningServiceSchema, req);
    const result = await this.service.updateService(
      validated.params.serviceId,
      validated.body
    );
    ApiResponse.success(res, result, "Service updated successfully");
  });

  deleteService = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(serviceIdParamSchema, req);
    await this.service.deleteService(validated.params.serviceId);
    ApiResponse.noContent(res);
  });

  listPublished = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.service.listPublishedServices();
    ApiResponse.success(res, result, "Services fetched successfully");
  });

  getPublished = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(serviceIdParamSchema, req);
    const service = await this.service.getPublishedService(
      validated.params.serviceId
    );
    ApiResponse.success(res, this.service.toResponse(service));
  });

  listAll = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.service.listAllServices();
    ApiResponse.success(res, result, "Services fetched successfully");
  });
}
