// file: src/modules/pricing/pricing.model.ts

import type { PaginateModel } from "mongoose";
import { model, Schema } from "mongoose";

import { BaseSchemaUtil } from "@/utils/base-schema.utils";

import type {
  IPricingBlock,
  IQuantityOption,
  IToggleOption,
  ITypeChoice,
  ITypeOption,
} from "./pricing.interface";
import { PRICING_BLOCK_KINDS, SEMANTIC_KEYS } from "./pricing.interface";

const quantityOptionSchema = new Schema<IQuantityOption>(
  {
    name: { type: String, required: true, trim: true },
    unitPrice: { type: Number, required: true, min: 0 },
    minQuantity: { type: Number, default: 1, min: 0 },
    maxQuantity: { type: Number, default: 100, min: 0 },
    unitName: { type: String, required: true, trim: true },
  },
  { _id: false }
);

const typeChoiceSchema = new Schema<ITypeChoice>(
  {
    name: { type: String, required: true, trim: true },
    price: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const typeOptionSchema = new Schema<ITypeOption>(
  {
    name: { type: String, required: true, trim: true },
    options: { type: [typeChoiceSchema], default: [] },
  },
  { _id: false }
);

const toggleOptionSchema = new Schema<IToggleOption>(
  {
    name: { type: String, required: true, trim: true },
    shortDescription: { type: String, required: true, trim: true },
    fullDescription: { type: String, trim: true },
    percentageIncrease: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const pricingBlockSchema = BaseSchemaUtil.createSchema<IPricingBlock>({
  serviceId: {
    type: Schema.Types.ObjectId,
    ref: "CleaningService",
    required: true,
    index: true,
  },
  name: {
    type: String,
    required: true,
    trim: true,
  },
  kind: {
    type: String,
    enum: [...PRICING_BLOCK_KINDS],
    required: true,
  },
  semanticKey: {
    type: String,
    enum: [...SEMANTIC_KEYS],
    default: "custom",
  },
  order: {
    type: Number,
    default: 0,
  },
  isRequired: {
    type: Boolean,
    default: true,
  },
  isActive: {
    type: Boolean,
    default: true,
    index: true,
  },
  quantityOption: {
    type: quantityOptionSchema,
    default: null,
  },
  typeOption: {
    type: typeOptionSchema,
    default: null,
  },
  toggleOption: {
    type: toggleOptionSchema,
    default: null,
  },
});

pricingBlockSchema.index({ serviceId: 1, isActive: 1, order: 1 });

export const PricingBlock = model<IPricingBlock, PaginateModel<IPricingBlock>>(
  "PricingBlock",
  pricingBlockSchema
);
