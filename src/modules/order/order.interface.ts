// file: src/modules/order/order.interface.ts

import type { Types } from "mongoose";

import type {
  BreakdownEntry,
  PricingSelection,
  ServiceParameters,
} from "@/modules/pricing/pricing.type";

export const ORDER_STATUSES = [
  "pending_confirmation",
  "confirmed",
  "completed",
  "cancelled",
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

/**
 * Orders in these states hold their slot on the calendar.
 */
export const SLOT_HOLDING_STATUSES: readonly OrderStatus[] = [
  "pending_confirmation",
  "confirmed",
];

/**
 * Snapshot of one priced service, frozen at order time. Later edits to
 * the service or its blocks never change it.
 */
export interface IOrderItem {
  serviceId: Types.ObjectId;
  serviceName: string;
  parameters: ServiceParameters;
  selections: PricingSelection[];
  breakdown: BreakdownEntry[];
  calculatedCost: number;
  calculatedTimeMinutes: number;
}

export interface IOrder {
  _id: Types.ObjectId;
  clientId: Types.ObjectId;
  scheduledDate: string;
  scheduledTime: string;
  totalDurationMinutes: number;
  totalPrice: number;
  status: OrderStatus;
  cleanerId?: Types.ObjectId | null;
  notes?: string;
  items: IOrderItem[];
  createdAt: Date;
  updatedAt: Date;
}
