// file: src/modules/pricing/pricing.calculator.ts

import type {
  BreakdownEntry,
  PricedBlock,
  PricingResult,
  PricingSelection,
  SelectionViolation,
} from "./pricing.type";

export type PricingRates = {
  minutesPerQuantityUnit: number;
  typeChoiceMinutes: number;
};

/**
 * Fixed business rates: 15 minutes per counted unit, 30 minutes for a chosen type.
 */
export const DEFAULT_PRICING_RATES: Readonly<PricingRates> = {
  minutesPerQuantityUnit: 15,
  typeChoiceMinutes: 30,
};

export const DURATION_STEP_MINUTES = 30;

/**
 * Prices one service from its active blocks and the caller's selections.
 *
 * Toggle blocks carry a percentage that is recorded in the breakdown but
 * never resolved against a base amount: a toggle contributes no price and
 * no time. Flat add-ons are configured as `type_choice` or `quantity` blocks.
 */
export class PricingCalculator {
  constructor(private readonly rates: PricingRates = DEFAULT_PRICING_RATES) {}

  /**
   * Never throws. Selections for unknown or inactive blocks are skipped;
   * misconfigured blocks contribute zero with an explanatory entry.
   * The total is the unrounded sum of contributions.
   */
  calculate(
    blocks: readonly PricedBlock[],
    selections: readonly PricingSelection[]
  ): PricingResult {
    const blocksById = new Map(
      blocks.map((block) => [block._id.toString(), block])
    );

    const breakdown: BreakdownEntry[] = [];
    let totalPrice = 0;
    let estimatedTimeMinutes = 0;

    for (const selection of selections) {
      const block = blocksById.get(selection.blockId);
      if (!block || !block.isActive) {
        continue;
      }

      const entry = this.priceBlock(block, selection);
      totalPrice += entry.price;
      estimatedTimeMinutes += entry.timeMinutes;
      breakdown.push(entry);
    }

    return { totalPrice, breakdown, estimatedTimeMinutes };
  }

  /**
   * Quantity bounds, required blocks and one selection per block. A zero
   * quantity on an optional block means the block is not used.
   */
  validateSelections(
    blocks: readonly PricedBlock[],
    selections: readonly PricingSelection[]
  ): SelectionViolation[] {
    const selectionsById = new Map<string, PricingSelection>();
    const repeated = new Set<string>();
    for (const selection of selections) {
      if (selectionsById.has(selection.blockId)) {
        repeated.add(selection.blockId);
      }
      selectionsById.set(selection.blockId, selection);
    }
    const violations: SelectionViolation[] = [];

    for (const block of blocks) {
      if (!block.isActive) {
        continue;
      }

      const blockId = block._id.toString();
      const selection = selectionsById.get(blockId);

      if (repeated.has(blockId)) {
        violations.push({
          blockId,
          blockName: block.name,
          message: `${block.name}: selected more than once`,
        });
        continue;
      }

      if (block.kind === "quantity" && block.quantityOption) {
        const { minQuantity, maxQuantity } = block.quantityOption;
        const quantity = selection?.quantity ?? 0;

        if (quantity === 0 && !block.isRequired) {
          continue;
        }

        if (
          !Number.isInteger(quantity) ||
          quantity < minQuantity ||
          quantity > maxQuantity
        ) {
          violations.push({
            blockId,
            blockName: block.name,
            message: `${block.name}: quantity must be between ${minQuantity} and ${maxQuantity}`,
          });
        }
      }

      if (
        block.kind === "type_choice" &&
        block.isRequired &&
        !selection?.selectedType
      ) {
        violations.push({
          blockId,
          blockName: block.name,
          message: `${block.name}: a type must be selected`,
        });
      }
    }

    return violations;
  }

  private priceBlock(
    block: PricedBlock,
    selection: PricingSelection
  ): BreakdownEntry {
    switch (block.kind) {
      case "quantity":
        return this.priceQuantity(block, selection);
      case "type_choice":
        return this.priceTypeChoice(block, selection);
      case "toggle":
        return this.priceToggle(block, selection);
    }
  }

  private priceQuantity(
    block: PricedBlock,
    selection: PricingSelection
  ): BreakdownEntry {
    const option = block.quantityOption;
    if (!option) {
      return this.emptyEntry(block, `${block.name}: option not configured`);
    }

    const quantity = selection.quantity ?? 0;

    return {
      ...this.emptyEntry(
        block,
        `${quantity} ${option.unitName} × $${option.unitPrice}`
      ),
      quantity,
      unitPrice: option.unitPrice,
      unitName: option.unitName,
      price: quantity * option.unitPrice,
      timeMinutes: quantity * this.rates.minutesPerQuantityUnit,
    };
  }

  private priceTypeChoice(
    block: PricedBlock,
    selection: PricingSelection
  ): BreakdownEntry {
    const option = block.typeOption;
    if (!option) {
      return this.emptyEntry(block, `${block.name}: option not configured`);
    }

    const selectedType = selection.selectedType;
    if (!selectedType) {
      return this.emptyEntry(block, `${block.name}: no type selected`);
    }

    if (!Array.isArray(option.options)) {
      return this.emptyEntry(block, `${block.name}: options are misconfigured`);
    }

    const choice = option.options
      .map(readTypeChoice)
      .find((entry) => entry?.name === selectedType);
    if (!choice) {
      return {
        ...this.emptyEntry(block, `${block.name}: selected type not found`),
        selectedType,
      };
    }

    if (typeof choice.price !== "number" || !Number.isFinite(choice.price)) {
      return {
        ...this.emptyEntry(block, `${block.name}: options are misconfigured`),
        selectedType,
      };
    }

    return {
      ...this.emptyEntry(block, `${block.name}: ${selectedType}`),
      selectedType,
      price: choice.price,
      timeMinutes: this.rates.typeChoiceMinutes,
    };
  }

  private priceToggle(
    block: PricedBlock,
    selection: PricingSelection
  ): BreakdownEntry {
    const option = block.toggleOption;
    if (!option) {
      return this.emptyEntry(block, `${block.name}: option not configured`);
    }

    if (!selection.enabled) {
      return {
        ...this.emptyEntry(block, `${block.name}: disabled`),
        enabled: false,
        percentageIncrease: option.percentageIncrease,
      };
    }

    return {
      ...this.emptyEntry(block, `${block.name}: +${option.percentageIncrease}%`),
      enabled: true,
      percentageIncrease: option.percentageIncrease,
    };
  }

  private emptyEntry(block: PricedBlock, description: string): BreakdownEntry {
    return {
      blockId: block._id.toString(),
      blockName: block.name,
      kind: block.kind,
      price: 0,
      timeMinutes: 0,
      description,
    };
  }
}

function readTypeChoice(
  entry: unknown
): { name: unknown; price: unknown } | null {
  if (typeof entry !== "object" || entry === null) {
    return null;
  }
  return { name: Reflect.get(entry, "name"), price: Reflect.get(entry, "price") };
}

export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Nearest multiple of `step`, halves rounding up (105 → 120, 135 → 150).
 * Never below one step, so a booked duration is always positive.
 */
export function roundDurationToStep(
  minutes: number,
  step: number = DURATION_STEP_MINUTES
): number {
  const rounded = Math.floor(minutes / step + 0.5) * step;
  return Math.max(step, rounded);
}
