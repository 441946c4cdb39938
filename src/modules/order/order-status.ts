// file: src/modules/order/order-status.ts

import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { BadRequestException } from "@/utils/app-error.utils";

import type { OrderStatus } from "./order.interface";

export const ORDER_STATUS_TRANSITIONS: Readonly<
  Record<OrderStatus, readonly OrderStatus[]>
> = {
  pending_confirmation: ["confirmed", "cancelled"],
  confirmed: ["completed", "cancelled"],
  completed: [],
  cancelled: [],
};

export const isTerminalStatus = (status: OrderStatus): boolean =>
  ORDER_STATUS_TRANSITIONS[status].length === 0;

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  ORDER_STATUS_TRANSITIONS[from].includes(to);

export function assertTransition(from: OrderStatus, to: OrderStatus): void {
  if (!canTransition(from, to)) {
    throw new BadRequestException(
      `Cannot change order status from ${from} to ${to}`,
      ErrorCodeEnum.ORDER_INVALID_STATUS_TRANSITION
    );
  }
}
