// file: src/modules/pricing/pricing.interface.ts

import type { Types } from "mongoose";

export const PRICING_BLOCK_KINDS = ["quantity", "type_choice", "toggle"] as const;
export type PricingBlockKind = (typeof PRICING_BLOCK_KINDS)[number];

/**
 * Stable identity of a block, set by the admin when the block is created.
 * Order parameters reach blocks through this key, never through the block name.
 */
export const SEMANTIC_KEYS = [
  "cushion_removable",
  "cushion_unremovable",
  "pillow",
  "window",
  "rug",
  "base_cleaning",
  "pet_hair",
  "urine_stains",
  "accelerated_drying",
  "custom",
] as const;
export type SemanticKey = (typeof SEMANTIC_KEYS)[number];

export interface IQuantityOption {
  name: string;
  unitPrice: number;
  minQuantity: number;
  maxQuantity: number;
  unitName: string;
}

export interface ITypeChoice {
  name: string;
  price: number;
}

export interface ITypeOption {
  name: string;
  options: ITypeChoice[];
}

export interface IToggleOption {
  name: string;
  shortDescription: string;
  fullDescription?: string;
  percentageIncrease: number;
}

export interface IPricingBlock {
  _id: Types.ObjectId;
  serviceId: Types.ObjectId;
  name: string;
  kind: PricingBlockKind;
  semanticKey: SemanticKey;
  order: number;
  isRequired: boolean;
  isActive: boolean;
  quantityOption?: IQuantityOption | null;
  typeOption?: ITypeOption | null;
  toggleOption?: IToggleOption | null;
  createdAt: Date;
  updatedAt: Date;
}
