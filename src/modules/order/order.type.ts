// file: src/modules/order/order.type.ts

import type { PaginationQuery } from "@/ts/pagination.types";
import type {
  BreakdownEntry,
  PricingSelection,
  ServiceParameters,
} from "@/modules/pricing/pricing.type";

import type { OrderStatus } from "./order.interface";

export type OrderItemInput = {
  serviceId: string;
  parameters?: ServiceParameters;
  selections?: PricingSelection[];
};

export type PricedOrderItem = {
  serviceId: string;
  serviceName: string;
  parameters: ServiceParameters;
  selections: PricingSelection[];
  breakdown: BreakdownEntry[];
  calculatedCost: number;
  calculatedTimeMinutes: number;
};

export type OrderCalculation = {
  totalPrice: number;
  totalDurationMinutes: number;
  items: PricedOrderItem[];
};

export type OrderCreatePayload = {
  scheduledDate: string;
  scheduledTime: string;
  items: OrderItemInput[];
  notes?: string;
};

export type OrderStatusUpdatePayload = {
  status: OrderStatus;
  notes?: string;
};

export type OrderListQuery = PaginationQuery & {
  status?: OrderStatus;
  dateFrom?: string;
  dateTo?: string;
};

export type TimeslotsResponse = {
  date: string;
  durationMinutes: number;
  availableSlots: string[];
  workingHours: { start: string; end: string };
  slotDurationMinutes: number;
};

export type OrderResponse = {
  _id: string;
  clientId: string;
  scheduledDate: string;
  scheduledTime: string;
  totalDurationMinutes: number;
  totalPrice: number;
  status: OrderStatus;
  cleanerId: string | null;
  notes?: string;
  items: PricedOrderItem[];
  createdAt: Date;
  updatedAt: Date;
};
