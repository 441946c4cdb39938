// file: src/modules/order/order.model.ts

import type { PaginateModel } from "mongoose";
import { model, Schema } from "mongoose";

import { PRICING_BLOCK_KINDS } from "@/modules/pricing/pricing.interface";
import type {
  BreakdownEntry,
  PricingSelection,
  ServiceParameters,
} from "@/modules/pricing/pricing.type";
import { BaseSchemaUtil } from "@/utils/base-schema.utils";

import type { IOrder, IOrderItem } from "./order.interface";
import { ORDER_STATUSES } from "./order.interface";

const parametersSchema = new Schema<ServiceParameters>(
  {
    removableCushionCount: { type: Number, min: 0 },
    unremovableCushionCount: { type: Number, min: 0 },
    pillowCount: { type: Number, min: 0 },
    windowCount: { type: Number, min: 0 },
    rugCount: { type: Number, min: 0 },
    rugWidth: { type: Number, min: 0 },
    rugLength: { type: Number, min: 0 },
    baseCleaning: { type: Boolean },
    petHair: { type: Boolean },
    urineStains: { type: Boolean },
    acceleratedDrying: { type: Boolean },
  },
  { _id: false }
);

const selectionSchema = new Schema<PricingSelection>(
  {
    blockId: { type: String, required: true },
    quantity: { type: Number },
    selectedType: { type: String },
    enabled: { type: Boolean },
  },
  { _id: false }
);

const breakdownSchema = new Schema<BreakdownEntry>(
  {
    blockId: { type: String, required: true },
    blockName: { type: String, required: true },
    kind: { type: String, enum: [...PRICING_BLOCK_KINDS], required: true },
    price: { type: Number, required: true },
    timeMinutes: { type: Number, required: true },
    description: { type: String, required: true },
    quantity: { type: Number },
    unitPrice: { type: Number },
    unitName: { type: String },
    selectedType: { type: String },
    enabled: { type: Boolean },
    percentageIncrease: { type: Number },
  },
  { _id: false }
);

const orderItemSchema = new Schema<IOrderItem>(
  {
    serviceId: {
      type: Schema.Types.ObjectId,
      ref: "CleaningService",
      required: true,
    },
    serviceName: { type: String, required: true },
    parameters: { type: parametersSchema, default: {} },
    selections: { type: [selectionSchema], default: [] },
    breakdown: { type: [breakdownSchema], default: [] },
    calculatedCost: { type: Number, required: true, min: 0 },
    calculatedTimeMinutes: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const orderSchema = BaseSchemaUtil.createSchema<IOrder>({
  clientId: {
    type: Schema.Types.ObjectId,
    ref: "User",
    required: true,
    index: true,
  },
  scheduledDate: {
    type: String,
    required: true,
    match: /^\d{4}-\d{2}-\d{2}$/,
  },
  scheduledTime: {
    type: String,
    required: true,
    match: /^([01]\d|2[0-3]):[0-5]\d$/,
  },
  totalDurationMinutes: {
    type: Number,
    required: true,
    min: 0,
  },
  totalPrice: {
    type: Number,
    required: true,
    min: 0,
  },
  ...BaseSchemaUtil.statusField(ORDER_STATUSES),
  cleanerId: {
    type: Schema.Types.ObjectId,
    ref: "User",
    default: null,
    index: true,
  },
  notes: {
    type: String,
    trim: true,
    maxlength: 1000,
  },
  items: {
    type: [orderItemSchema],
    validate: {
      validator: (items: IOrderItem[]) => items.length > 0,
      message: "An order needs at least one item",
    },
  },
});

orderSchema.index({ scheduledDate: 1, status: 1 });
orderSchema.index({ "items.serviceId": 1 });

export const Order = model<IOrder, PaginateModel<IOrder>>("Order", orderSchema);
