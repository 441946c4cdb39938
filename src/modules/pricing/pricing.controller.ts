import type { Request, Response } from "express";

import { asyncHandler } from "@/middlewares/async-handler.middleware";
import { ApiResponse } from "@/utils/response.utils";
import { zParse } from "@/utils/validators.utils";

import {
  blockParamSchema,
  createPricingBlockSchema,
  pricingPreviewSchema,
  reorderPricingBlocksSchema,
  serviceParamSchema,
  updatePricingBlockSchema,
} from "./pricing.schema";
import { PricingService } from "./pricing.service";

export class PricingController {
  private service: PricingService;

  constructor() {
    this.service = new PricingService();
  }

  createBlock = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(createPricingBlockSchema, req);
    const result = await this.service.createBlock(
      validated.params.serviceId,
      validated.body
    );
    ApiResponse.created(res, result, "Pricing block created successfully");
  });

  updateBlock = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(updatePricingBlockSchema, req);
    const result = await this.service.updateBlock(
      validated.params.blockId,
      validated.body
    );
    ApiResponse.success(res, result, "Pricing block updated successfully");
  });

  deactivateBlock = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(blockParamSchema, req);
    const result = await this.service.deactivateBlock(validated.params.blockId);
    ApiResponse.success(res, result, "Pricing block deactivated");
  });

  reorderBlocks = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(reorderPricingBlocksSchema, req);
    const result = await this.service.reorderBlocks(
      validated.params.serviceId,
      validated.body.blocks
    );
    ApiResponse.success(res, result, "Pricing blocks reordered");
  });

  listBlocks = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(serviceParamSchema, req);
    const result = await this.service.listBlocks(
      validated.params.serviceId,
      true
    );
    ApiResponse.success(res, result, "Pricing blocks fetched successfully");
  });

  getStructure = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(serviceParamSchema, req);
    const result = await this.service.getPricingStructure(
      validated.params.serviceId
    );
    ApiResponse.success(res, result);
  });

  previewPrice = asyncHandler(async (req: Request, res: Response) => {
    const validated = await zParse(pricingPreviewSchema, req);
    const result = await this.service.previewPrice(
      validated.params.serviceId,
      validated.body.selections
    );
    ApiResponse.success(res, result, "Price calculated successfully");
  });
}
