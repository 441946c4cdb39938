// file: src/modules/order/order.service.ts

import { Types, type FilterQuery } from "mongoose";

import { BOOKING_CONFIG } from "@/config/booking.config";
import { MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { logger } from "@/middlewares/pino-logger";
import type { IUser } from "@/modules/user/user.interface";
import { UserRepository } from "@/modules/user/user.repository";
import { EmailService } from "@/services/email.service";
import type { PaginatedResponse } from "@/ts/pagination.types";
import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from "@/utils/app-error.utils";
import { PaginationHelper } from "@/utils/pagination-helper";
import { todayAsCalendarDate } from "@/utils/time.utils";
import {
  TransactionHelper,
  type TransactionRunner,
} from "@/utils/transaction.utils";

import {
  AvailabilityChecker,
  DEFAULT_REQUESTED_DURATION_MINUTES,
} from "./availability.checker";
import { assertTransition, isTerminalStatus } from "./order-status";
import {
  BookingLockRepository,
  cleanerLockKey,
  dayLockKey,
  type BookingLockStore,
} from "./booking-lock.repository";
import { OrderPricer } from "./order-pricing";
import type { IOrder } from "./order.interface";
import { OrderRepository, type OrderStore } from "./order.repository";
import type {
  OrderCalculation,
  OrderCreatePayload,
  OrderItemInput,
  OrderListQuery,
  OrderResponse,
  OrderStatusUpdatePayload,
  TimeslotsResponse,
} from "./order.type";

export interface OrderUserLookup {
  findById(userId: string): Promise<IUser | null>;
  findCleanerById(cleanerId: string): Promise<IUser | null>;
}

export type OrderNotifier = Pick<
  EmailService,
  "sendOrderReceived" | "sendOrderStatusChanged" | "sendCleanerAssigned"
>;

export type OrderServiceDeps = {
  orders: OrderStore;
  locks: BookingLockStore;
  pricer: OrderPricer;
  users: OrderUserLookup;
  checker: AvailabilityChecker;
  runInTransaction: TransactionRunner;
  notifier: OrderNotifier;
  now: () => Date;
};

export class OrderService {
  private orders: OrderStore;
  private locks: BookingLockStore;
  private pricer: OrderPricer;
  private users: OrderUserLookup;
  private checker: AvailabilityChecker;
  private runInTransaction: TransactionRunner;
  private notifier: OrderNotifier;
  private now: () => Date;

  constructor(deps: Partial<OrderServiceDeps> = {}) {
    this.orders = deps.orders ?? new OrderRepository();
    this.locks = deps.locks ?? new BookingLockRepository();
    this.pricer = deps.pricer ?? new OrderPricer();
    this.users = deps.users ?? new UserRepository();
    this.checker = deps.checker ?? new AvailabilityChecker(BOOKING_CONFIG);
    this.runInTransaction =
      deps.runInTransaction ?? TransactionHelper.withTransaction;
    this.notifier = deps.notifier ?? new EmailService();
    this.now = deps.now ?? (() => new Date());
  }

  async calculate(items: OrderItemInput[]): Promise<OrderCalculation> {
    return this.pricer.calculateOrderTotal(items);
  }

  async createOrder(
    clientId: string,
    payload: OrderCreatePayload
  ): Promise<OrderResponse> {
    this.assertBookableDate(payload.scheduledDate);

    if (!this.checker.isOnSlotGrid(payload.scheduledTime)) {
      throw new BadRequestException(
        `Booking time must start on a ${this.checker.slotDurationMinutes}-minute slot within working hours`,
        ErrorCodeEnum.TIMESLOT_MISALIGNED
      );
    }

    const calculation = await this.pricer.calculateOrderTotal(payload.items);

    const order = await this.runInTransaction(async (session) => {
      await this.locks.acquire(dayLockKey(payload.scheduledDate), session);

      const existing = await this.orders.findActiveOnDate(
        payload.scheduledDate,
        { session }
      );

      const available = this.checker.isAvailable(
        payload.scheduledDate,
        payload.scheduledTime,
        calculation.totalDurationMinutes,
        existing
      );
      if (!available) {
        logger.info(
          {
            clientId,
            scheduledDate: payload.scheduledDate,
            scheduledTime: payload.scheduledTime,
            durationMinutes: calculation.totalDurationMinutes,
          },
          "Order rejected: timeslot unavailable"
        );
        throw new UnprocessableEntityException(
          MESSAGES.ORDER.TIMESLOT_UNAVAILABLE,
          ErrorCodeEnum.TIMESLOT_UNAVAILABLE
        );
      }

      return this.orders.create(
        {
          clientId: new Types.ObjectId(clientId),
          scheduledDate: payload.scheduledDate,
          scheduledTime: payload.scheduledTime,
          totalDurationMinutes: calculation.totalDurationMinutes,
          totalPrice: calculation.totalPrice,
          status: "pending_confirmation",
          cleanerId: null,
          notes: payload.notes,
          items: calculation.items.map((item) => ({
            ...item,
            serviceId: new Types.ObjectId(item.serviceId),
          })),
        },
        session
      );
    });

    logger.info(
      {
        orderId: order._id.toString(),
        clientId,
        totalPrice: order.totalPrice,
        totalDurationMinutes: order.totalDurationMinutes,
      },
      "Order created"
    );

    const client = await this.users.findById(clientId);
    if (client) {
      await this.notifier.sendOrderReceived({
        to: client.email,
        userName: client.fullName,
        orderId: order._id.toString(),
        scheduledDate: order.scheduledDate,
        scheduledTime: order.scheduledTime,
        totalPrice: order.totalPrice,
        estimatedTimeMinutes: order.totalDurationMinutes,
      });
    }

    return this.toResponse(order);
  }

  async listClientOrders(
    clientId: string,
    query: OrderListQuery
  ): Promise<PaginatedResponse<OrderResponse>> {
    return this.paginate({ ...this.buildFilter(query), clientId }, query);
  }

  async getClientOrder(
    clientId: string,
    orderId: string
  ): Promise<OrderResponse> {
    const order = await this.orders.findForClient(orderId, clientId);
    if (!order) {
      throw new NotFoundException(
        MESSAGES.ORDER.NOT_FOUND,
        ErrorCodeEnum.ORDER_NOT_FOUND
      );
    }
    return this.toResponse(order);
  }

  async getTimeslots(
    date: string,
    durationMinutes?: number
  ): Promise<TimeslotsResponse> {
    const existing = await this.orders.findActiveOnDate(date);
    const duration = durationMinutes ?? DEFAULT_REQUESTED_DURATION_MINUTES;

    return {
      date,
      durationMinutes: duration,
      availableSlots: this.checker.availableSlots(date, existing, duration),
      workingHours: this.checker.workingHours,
      slotDurationMinutes: this.checker.slotDurationMinutes,
    };
  }

  async listOrders(
    query: OrderListQuery
  ): Promise<PaginatedResponse<OrderResponse>> {
    return this.paginate(this.buildFilter(query), query);
  }

  async getOrder(orderId: string): Promise<OrderResponse> {
    return this.toResponse(await this.getOrderOrThrow(orderId));
  }

  async updateStatus(
    orderId: string,
    payload: OrderStatusUpdatePayload
  ): Promise<OrderResponse> {
    const order = await this.getOrderOrThrow(orderId);
    assertTransition(order.status, payload.status);

    const updated = await this.orders.updateStatus(
      orderId,
      order.status,
      payload.status,
      payload.notes
    );
    if (!updated) {
      const current = await this.getOrderOrThrow(orderId);
      throw new BadRequestException(
        `Order status changed to ${current.status} before it could be set to ${payload.status}`,
        ErrorCodeEnum.ORDER_INVALID_STATUS_TRANSITION
      );
    }

    logger.info(
      { orderId, from: order.status, to: updated.status },
      "Order status changed"
    );

    const client = await this.users.findById(updated.clientId.toString());
    if (client) {
      await this.notifier.sendOrderStatusChanged({
        to: client.email,
        userName: client.fullName,
        orderId,
        scheduledDate: updated.scheduledDate,
        scheduledTime: updated.scheduledTime,
        status: updated.status,
      });
    }

    return this.toResponse(updated);
  }

  /**
   * The cleaner must be free for the whole order interval; the order's own
   * current assignment does not count against it. The check and the write
   * share a transaction holding the cleaner's lock for that day.
   */
  async assignCleaner(
    orderId: string,
    cleanerId: string
  ): Promise<OrderResponse> {
    const order = await this.getOrderOrThrow(orderId);

    if (isTerminalStatus(order.status)) {
      throw new BadRequestException(
        `Cannot assign a cleaner to a ${order.status} order`,
        ErrorCodeEnum.ORDER_TERMINAL_STATE
      );
    }

    const cleaner = await this.users.findCleanerById(cleanerId);
    if (!cleaner) {
      throw new NotFoundException(
        MESSAGES.USER.CLEANER_NOT_FOUND,
        ErrorCodeEnum.CLEANER_NOT_FOUND
      );
    }

    const updated = await this.runInTransaction(async (session) => {
      await this.locks.acquire(
        cleanerLockKey(cleanerId, order.scheduledDate),
        session
      );

      const cleanerOrders = await this.orders.findActiveOnDate(
        order.scheduledDate,
        { cleanerId, session }
      );
      const free = this.checker.isAvailable(
        order.scheduledDate,
        order.scheduledTime,
        order.totalDurationMinutes,
        cleanerOrders,
        orderId
      );
      if (!free) {
        throw new ConflictException(
          MESSAGES.ORDER.CLEANER_UNAVAILABLE,
          ErrorCodeEnum.CLEANER_TIMESLOT_CONFLICT
        );
      }

      return this.orders.assignCleaner(orderId, cleanerId, session);
    });
    if (!updated) {
      const current = await this.getOrderOrThrow(orderId);
      throw new BadRequestException(
        `Cannot assign a cleaner to a ${current.status} order`,
        ErrorCodeEnum.ORDER_TERMINAL_STATE
      );
    }

    logger.info({ orderId, cleanerId }, "Cleaner assigned");

    const client = await this.users.findById(updated.clientId.toString());
    await this.notifier.sendCleanerAssigned({
      to: cleaner.email,
      userName: cleaner.fullName,
      orderId,
      scheduledDate: updated.scheduledDate,
      scheduledTime: updated.scheduledTime,
      address: client?.address,
    });

    return this.toResponse(updated);
  }

  toResponse(order: IOrder): OrderResponse {
    return {
      _id: order._id.toString(),
      clientId: order.clientId.toString(),
      scheduledDate: order.scheduledDate,
      scheduledTime: order.scheduledTime,
      totalDurationMinutes: order.totalDurationMinutes,
      totalPrice: order.totalPrice,
      status: order.status,
      cleanerId: order.cleanerId ? order.cleanerId.toString() : null,
      notes: order.notes,
      items: order.items.map((item) => ({
        serviceId: item.serviceId.toString(),
        serviceName: item.serviceName,
        parameters: item.parameters,
        selections: item.selections,
        breakdown: item.breakdown,
        calculatedCost: item.calculatedCost,
        calculatedTimeMinutes: item.calculatedTimeMinutes,
      })),
      createdAt: order.createdAt,
      updatedAt: order.updatedAt,
    };
  }

  private assertBookableDate(date: string): void {
    if (date <= todayAsCalendarDate(this.now())) {
      throw new BadRequestException(
        "Order date must be in the future",
        ErrorCodeEnum.VALIDATION_ERROR
      );
    }
  }

  private buildFilter(query: OrderListQuery): FilterQuery<IOrder> {
    const filter: FilterQuery<IOrder> = {};
    if (query.status) {
      filter.status = query.status;
    }
    if (query.dateFrom || query.dateTo) {
      filter.scheduledDate = {
        ...(query.dateFrom ? { $gte: query.dateFrom } : {}),
        ...(query.dateTo ? { $lte: query.dateTo } : {}),
      };
    }
    return filter;
  }

  private async paginate(
    filter: FilterQuery<IOrder>,
    query: OrderListQuery
  ): Promise<PaginatedResponse<OrderResponse>> {
    const options = PaginationHelper.parsePaginationParams(query);
    const result = await this.orders.paginate(filter, options);
    return PaginationHelper.formatResponse(result, (order) =>
      this.toResponse(order)
    );
  }

  private async getOrderOrThrow(orderId: string): Promise<IOrder> {
    const order = await this.orders.findById(orderId);
    if (!order) {
      throw new NotFoundException(
        MESSAGES.ORDER.NOT_FOUND,
        ErrorCodeEnum.ORDER_NOT_FOUND
      );
    }
    return order;
  }
}
