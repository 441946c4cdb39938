// file: src/modules/pricing/pricing.type.ts

import type {
  IPricingBlock,
  IQuantityOption,
  IToggleOption,
  ITypeOption,
  PricingBlockKind,
  SemanticKey,
} from "./pricing.interface";

/**
 * Caller input for one block: exactly one of the value fields is meaningful,
 * depending on the block kind.
 */
export type PricingSelection = {
  blockId: string;
  quantity?: number;
  selectedType?: string;
  enabled?: boolean;
};

export type BreakdownEntry = {
  blockId: string;
  blockName: string;
  kind: PricingBlockKind;
  price: number;
  timeMinutes: number;
  description: string;
  quantity?: number;
  unitPrice?: number;
  unitName?: string;
  selectedType?: string;
  enabled?: boolean;
  percentageIncrease?: number;
};

export type PricingResult = {
  totalPrice: number;
  breakdown: BreakdownEntry[];
  estimatedTimeMinutes: number;
};

export type SelectionViolation = {
  blockId: string;
  blockName: string;
  message: string;
};

/**
 * Structured order-item parameters. Each one feeds the block carrying the
 * matching semantic key.
 */
export type ServiceParameters = {
  removableCushionCount?: number;
  unremovableCushionCount?: number;
  pillowCount?: number;
  windowCount?: number;
  rugCount?: number;
  rugWidth?: number;
  rugLength?: number;
  baseCleaning?: boolean;
  petHair?: boolean;
  urineStains?: boolean;
  acceleratedDrying?: boolean;
};

/**
 * A type-choice payload as read back from storage. The choices are checked
 * when priced, not trusted.
 */
export type StoredTypeOption = {
  name: string;
  options: unknown;
};

export type PricedBlock = Pick<
  IPricingBlock,
  | "_id"
  | "name"
  | "kind"
  | "isActive"
  | "isRequired"
  | "semanticKey"
  | "quantityOption"
  | "toggleOption"
> & {
  typeOption?: StoredTypeOption | null;
};

export type PricingBlockCreatePayload = {
  name: string;
  kind: PricingBlockKind;
  semanticKey?: SemanticKey;
  order?: number;
  isRequired?: boolean;
  quantityOption?: IQuantityOption;
  typeOption?: ITypeOption;
  toggleOption?: IToggleOption;
};

export type PricingBlockUpdatePayload = Partial<
  Omit<PricingBlockCreatePayload, "kind">
> & {
  isActive?: boolean;
};

export type BlockOrderEntry = {
  blockId: string;
  order: number;
};

export type PricingBlockResponse = {
  _id: string;
  serviceId: string;
  name: string;
  kind: PricingBlockKind;
  semanticKey: SemanticKey;
  order: number;
  isRequired: boolean;
  isActive: boolean;
  quantityOption?: IQuantityOption;
  typeOption?: ITypeOption;
  toggleOption?: IToggleOption;
  createdAt: Date;
  updatedAt: Date;
};

export type PricingPreviewResponse = PricingResult & {
  serviceId: string;
  serviceName: string;
};
