// file: src/modules/pricing/pricing-selection.builder.ts

import type { SemanticKey } from "./pricing.interface";
import type {
  PricedBlock,
  PricingSelection,
  ServiceParameters,
} from "./pricing.type";

type MappedParameter = Exclude<keyof ServiceParameters, "rugWidth" | "rugLength">;

export const SEMANTIC_PARAMETER_MAP: Readonly<
  Record<SemanticKey, MappedParameter | null>
> = {
  cushion_removable: "removableCushionCount",
  cushion_unremovable: "unremovableCushionCount",
  pillow: "pillowCount",
  window: "windowCount",
  rug: "rugCount",
  base_cleaning: "baseCleaning",
  pet_hair: "petHair",
  urine_stains: "urineStains",
  accelerated_drying: "acceleratedDrying",
  custom: null,
};

function selectionFor(
  block: PricedBlock,
  value: number | boolean
): PricingSelection | null {
  const blockId = block._id.toString();

  switch (block.kind) {
    case "quantity":
      return {
        blockId,
        quantity: typeof value === "number" ? value : Number(value),
      };
    case "toggle":
      return {
        blockId,
        enabled: typeof value === "boolean" ? value : value > 0,
      };
    case "type_choice":
      return null;
  }
}

/**
 * Turns structured parameters into block selections by semantic key, then
 * lets explicit selections replace the derived one for the same block.
 */
export function buildSelections(
  blocks: readonly PricedBlock[],
  parameters: ServiceParameters = {},
  explicit: readonly PricingSelection[] = []
): PricingSelection[] {
  const explicitById = new Map(
    explicit.map((selection) => [selection.blockId, selection])
  );
  const selections: PricingSelection[] = [];

  for (const block of blocks) {
    const blockId = block._id.toString();
    const override = explicitById.get(blockId);
    if (override) {
      selections.push(override);
      explicitById.delete(blockId);
      continue;
    }

    const parameter = SEMANTIC_PARAMETER_MAP[block.semanticKey];
    const value = parameter ? parameters[parameter] : undefined;
    if (value === undefined) {
      continue;
    }

    const selection = selectionFor(block, value);
    if (selection) {
      selections.push(selection);
    }
  }

  return [...selections, ...explicitById.values()];
}
