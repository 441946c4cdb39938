// file: src/modules/order/order-pricing.ts

import { MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import {
  CleaningServiceRepository,
  type CleaningServiceStore,
} from "@/modules/cleaning-service/cleaning-service.repository";
import {
  PricingCalculator,
  roundCurrency,
  roundDurationToStep,
} from "@/modules/pricing/pricing.calculator";
import {
  PricingBlockRepository,
  type PricingBlockStore,
} from "@/modules/pricing/pricing.repository";
import { buildSelections } from "@/modules/pricing/pricing-selection.builder";
import {
  BadRequestException,
  NotFoundException,
} from "@/utils/app-error.utils";

import type {
  OrderCalculation,
  OrderItemInput,
  PricedOrderItem,
} from "./order.type";

/**
 * Prices a whole order. Any unknown or unpublished service fails the
 * calculation; no partial totals are returned.
 */
export class OrderPricer {
  private services: CleaningServiceStore;
  private blocks: PricingBlockStore;
  private calculator: PricingCalculator;

  constructor(
    services: CleaningServiceStore = new CleaningServiceRepository(),
    blocks: PricingBlockStore = new PricingBlockRepository(),
    calculator: PricingCalculator = new PricingCalculator()
  ) {
    this.services = services;
    this.blocks = blocks;
    this.calculator = calculator;
  }

  async calculateOrderTotal(
    items: readonly OrderItemInput[]
  ): Promise<OrderCalculation> {
    const priced: PricedOrderItem[] = [];
    for (const item of items) {
      priced.push(await this.priceItem(item));
    }

    const totalPrice = priced.reduce(
      (sum, item) => sum + item.calculatedCost,
      0
    );
    const totalMinutes = priced.reduce(
      (sum, item) => sum + item.calculatedTimeMinutes,
      0
    );

    return {
      totalPrice: roundCurrency(totalPrice),
      totalDurationMinutes: roundDurationToStep(totalMinutes),
      items: priced,
    };
  }

  private async priceItem(item: OrderItemInput): Promise<PricedOrderItem> {
    const service = await this.services.findActiveById(item.serviceId);
    if (!service || !service.isPublished) {
      throw new NotFoundException(
        `${MESSAGES.SERVICE.NOT_FOUND}: ${item.serviceId}`,
        ErrorCodeEnum.SERVICE_NOT_FOUND
      );
    }

    const blocks = await this.blocks.findByService(item.serviceId);
    const parameters = item.parameters ?? {};
    const selections = buildSelections(blocks, parameters, item.selections);

    const violations = this.calculator.validateSelections(blocks, selections);
    if (violations.length > 0) {
      throw new BadRequestException(
        `${service.name}: ${violations.map((v) => v.message).join("; ")}`,
        ErrorCodeEnum.PRICING_QUANTITY_OUT_OF_RANGE
      );
    }

    const result = this.calculator.calculate(blocks, selections);

    return {
      serviceId: service._id.toString(),
      serviceName: service.name,
      parameters,
      selections,
      breakdown: result.breakdown,
      calculatedCost: roundCurrency(result.totalPrice),
      calculatedTimeMinutes: result.estimatedTimeMinutes,
    };
  }
}
