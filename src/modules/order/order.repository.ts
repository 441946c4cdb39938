// file: src/modules/order/order.repository.ts

import type {
  ClientSession,
  FilterQuery,
  PaginateOptions,
  PaginateResult,
  UpdateQuery,
} from "mongoose";

import { BaseRepository } from "@/modules/base/base.repository";

import type { IOrder, OrderStatus } from "./order.interface";
import { SLOT_HOLDING_STATUSES } from "./order.interface";
import { Order } from "./order.model";

export interface OrderStore {
  findById(orderId: string): Promise<IOrder | null>;
  findForClient(orderId: string, clientId: string): Promise<IOrder | null>;
  findActiveOnDate(
    scheduledDate: string,
    options?: { cleanerId?: string; session?: ClientSession }
  ): Promise<IOrder[]>;
  create(data: Partial<IOrder>, session?: ClientSession): Promise<IOrder>;
  updateStatus(
    orderId: string,
    from: OrderStatus,
    to: OrderStatus,
    notes?: string
  ): Promise<IOrder | null>;
  assignCleaner(
    orderId: string,
    cleanerId: string,
    session?: ClientSession
  ): Promise<IOrder | null>;
  paginate(
    filter: FilterQuery<IOrder>,
    options: PaginateOptions
  ): Promise<PaginateResult<IOrder>>;
}

export class OrderRepository
  extends BaseRepository<IOrder>
  implements OrderStore
{
  constructor() {
    super(Order);
  }

  async findForClient(orderId: string, clientId: string) {
    return this.model.findOne({ _id: orderId, clientId }).exec();
  }

  /**
   * Orders still holding a slot on the given date, optionally narrowed to
   * one cleaner. Runs inside the caller's session when one is given.
   */
  async findActiveOnDate(
    scheduledDate: string,
    options: { cleanerId?: string; session?: ClientSession } = {}
  ) {
    const filter: FilterQuery<IOrder> = {
      scheduledDate,
      status: { $in: [...SLOT_HOLDING_STATUSES] },
    };
    if (options.cleanerId) {
      filter.cleanerId = options.cleanerId;
    }

    return this.find(filter, {
      sort: { scheduledTime: 1 },
      session: options.session,
    });
  }

  /**
   * Applies the change only while the order is still in `from`; null when
   * the order is gone or another writer moved it first.
   */
  async updateStatus(
    orderId: string,
    from: OrderStatus,
    to: OrderStatus,
    notes?: string
  ) {
    const update: UpdateQuery<IOrder> = { status: to };
    if (notes !== undefined) {
      update.notes = notes;
    }

    return this.model
      .findOneAndUpdate({ _id: orderId, status: from }, update, {
        new: true,
        runValidators: true,
      })
      .exec();
  }

  async assignCleaner(
    orderId: string,
    cleanerId: string,
    session?: ClientSession
  ) {
    return this.model
      .findOneAndUpdate(
        { _id: orderId, status: { $in: [...SLOT_HOLDING_STATUSES] } },
        { cleanerId },
        { new: true, runValidators: true, session }
      )
      .exec();
  }

  async isServiceReferenced(serviceId: string): Promise<boolean> {
    return this.exists({ "items.serviceId": serviceId });
  }
}
