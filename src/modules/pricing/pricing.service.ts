// file: src/modules/pricing/pricing.service.ts

import { Types } from "mongoose";

import { MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { logger } from "@/middlewares/pino-logger";
import type { ICleaningService } from "@/modules/cleaning-service/cleaning-service.interface";
import {
  CleaningServiceRepository,
  type CleaningServiceStore,
} from "@/modules/cleaning-service/cleaning-service.repository";
import {
  BadRequestException,
  NotFoundException,
} from "@/utils/app-error.utils";

import {
  PricingCalculator,
  roundCurrency,
} from "./pricing.calculator";
import type { IPricingBlock } from "./pricing.interface";
import {
  PricingBlockRepository,
  type PricingBlockStore,
} from "./pricing.repository";
import type {
  BlockOrderEntry,
  PricingBlockCreatePayload,
  PricingBlockResponse,
  PricingBlockUpdatePayload,
  PricingPreviewResponse,
  PricingSelection,
  SelectionViolation,
} from "./pricing.type";

const PAYLOAD_FIELD = {
  quantity: "quantityOption",
  type_choice: "typeOption",
  toggle: "toggleOption",
} as const;

export class PricingService {
  private blocks: PricingBlockStore;
  private services: CleaningServiceStore;
  private calculator: PricingCalculator;

  constructor(
    blocks: PricingBlockStore = new PricingBlockRepository(),
    services: CleaningServiceStore = new CleaningServiceRepository(),
    calculator: PricingCalculator = new PricingCalculator()
  ) {
    this.blocks = blocks;
    this.services = services;
    this.calculator = calculator;
  }

  async createBlock(
    serviceId: string,
    payload: PricingBlockCreatePayload
  ): Promise<PricingBlockResponse> {
    await this.getServiceOrThrow(serviceId);
    this.assertPayloadMatchesKind(payload.kind, payload);

    const block = await this.blocks.create({
      serviceId: new Types.ObjectId(serviceId),
      name: payload.name,
      kind: payload.kind,
      semanticKey: payload.semanticKey ?? "custom",
      order: payload.order ?? 0,
      isRequired: payload.isRequired ?? true,
      isActive: true,
      quantityOption: payload.kind === "quantity" ? payload.quantityOption : null,
      typeOption: payload.kind === "type_choice" ? payload.typeOption : null,
      toggleOption: payload.kind === "toggle" ? payload.toggleOption : null,
    });

    logger.info(
      { serviceId, blockId: block._id.toString(), kind: block.kind },
      "Pricing block created"
    );
    return this.toResponse(block);
  }

  async updateBlock(
    blockId: string,
    payload: PricingBlockUpdatePayload
  ): Promise<PricingBlockResponse> {
    const block = await this.getBlockOrThrow(blockId);
    this.assertPayloadMatchesKind(block.kind, payload);

    const updated = await this.blocks.updateById(blockId, {
      name: payload.name,
      semanticKey: payload.semanticKey,
      order: payload.order,
      isRequired: payload.isRequired,
      isActive: payload.isActive,
      quantityOption: payload.quantityOption,
      typeOption: payload.typeOption,
      toggleOption: payload.toggleOption,
    });
    if (!updated) {
      throw new NotFoundException(
        MESSAGES.PRICING.BLOCK_NOT_FOUND,
        ErrorCodeEnum.PRICING_BLOCK_NOT_FOUND
      );
    }

    return this.toResponse(updated);
  }

  async deactivateBlock(blockId: string): Promise<PricingBlockResponse> {
    return this.updateBlock(blockId, { isActive: false });
  }

  async reorderBlocks(
    serviceId: string,
    entries: BlockOrderEntry[]
  ): Promise<PricingBlockResponse[]> {
    await this.getServiceOrThrow(serviceId);

    const existing = await this.blocks.findByService(serviceId, {
      includeInactive: true,
    });
    const knownIds = new Set(existing.map((block) => block._id.toString()));
    const unknown = entries.filter((entry) => !knownIds.has(entry.blockId));

    if (unknown.length > 0) {
      throw new BadRequestException(
        `Blocks do not belong to this service: ${unknown
          .map((entry) => entry.blockId)
          .join(", ")}`,
        ErrorCodeEnum.PRICING_BLOCK_NOT_FOUND
      );
    }

    await this.blocks.reorder(serviceId, entries);
    return this.listBlocks(serviceId, true);
  }

  async listBlocks(
    serviceId: string,
    includeInactive = false
  ): Promise<PricingBlockResponse[]> {
    await this.getServiceOrThrow(serviceId);
    const blocks = await this.blocks.findByService(serviceId, {
      includeInactive,
    });
    return blocks.map((block) => this.toResponse(block));
  }

  /**
   * Public view of a published service: active blocks in display order.
   */
  async getPricingStructure(serviceId: string) {
    const service = await this.getServiceOrThrow(serviceId, {
      publishedOnly: true,
    });
    const blocks = await this.blocks.findByService(serviceId);

    return {
      serviceId: service._id.toString(),
      serviceName: service.name,
      blocks: blocks.map((block) => this.toResponse(block)),
    };
  }

  async previewPrice(
    serviceId: string,
    selections: PricingSelection[]
  ): Promise<PricingPreviewResponse> {
    const service = await this.getServiceOrThrow(serviceId, {
      publishedOnly: true,
    });
    const blocks = await this.blocks.findByService(serviceId);

    this.assertSelectionsValid(
      this.calculator.validateSelections(blocks, selections)
    );

    const result = this.calculator.calculate(blocks, selections);

    return {
      serviceId: service._id.toString(),
      serviceName: service.name,
      totalPrice: roundCurrency(result.totalPrice),
      breakdown: result.breakdown,
      estimatedTimeMinutes: result.estimatedTimeMinutes,
    };
  }

  assertSelectionsValid(violations: SelectionViolation[]): void {
    if (violations.length > 0) {
      throw new BadRequestException(
        violations.map((violation) => violation.message).join("; "),
        ErrorCodeEnum.PRICING_QUANTITY_OUT_OF_RANGE
      );
    }
  }

  toResponse(block: IPricingBlock): PricingBlockResponse {
    return {
      _id: block._id.toString(),
      serviceId: block.serviceId.toString(),
      name: block.name,
      kind: block.kind,
      semanticKey: block.semanticKey,
      order: block.order,
      isRequired: block.isRequired,
      isActive: block.isActive,
      quantityOption: block.quantityOption ?? undefined,
      typeOption: block.typeOption ?? undefined,
      toggleOption: block.toggleOption ?? undefined,
      createdAt: block.createdAt,
      updatedAt: block.updatedAt,
    };
  }

  private assertPayloadMatchesKind(
    kind: IPricingBlock["kind"],
    payload: Pick<
      PricingBlockUpdatePayload,
      "quantityOption" | "typeOption" | "toggleOption"
    >
  ): void {
    const expected = PAYLOAD_FIELD[kind];
    const mismatched = Object.values(PAYLOAD_FIELD).filter(
      (field) => field !== expected && payload[field] !== undefined
    );

    if (mismatched.length > 0) {
      throw new BadRequestException(
        `A ${kind} block cannot take ${mismatched.join(", ")}`,
        ErrorCodeEnum.PRICING_OPTION_MISMATCH
      );
    }
  }

  private async getServiceOrThrow(
    serviceId: string,
    options: { publishedOnly?: boolean } = {}
  ): Promise<ICleaningService> {
    const service = await this.services.findActiveById(serviceId);
    if (!service || (options.publishedOnly && !service.isPublished)) {
      throw new NotFoundException(
        MESSAGES.SERVICE.NOT_FOUND,
        ErrorCodeEnum.SERVICE_NOT_FOUND
      );
    }
    return service;
  }

  private async getBlockOrThrow(blockId: string): Promise<IPricingBlock> {
    const block = await this.blocks.findById(blockId);
    if (!block) {
      throw new NotFoundException(
        MESSAGES.PRICING.BLOCK_NOT_FOUND,
        ErrorCodeEnum.PRICING_BLOCK_NOT_FOUND
      );
    }
    return block;
  }
}
