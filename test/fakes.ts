import type {
  FilterQuery,
  PaginateOptions,
  PaginateResult,
  UpdateQuery,
} from "mongoose";
import { Types } from "mongoose";

import type { ICleaningService } from "@/modules/cleaning-service/cleaning-service.interface";
import type { CleaningServiceStore } from "@/modules/cleaning-service/cleaning-service.repository";
import type { BookingLockStore } from "@/modules/order/booking-lock.repository";
import type { IOrder, OrderStatus } from "@/modules/order/order.interface";
import { SLOT_HOLDING_STATUSES } from "@/modules/order/order.interface";
import type { OrderStore } from "@/modules/order/order.repository";
import type { IPricingBlock } from "@/modules/pricing/pricing.interface";
import type { PricingBlockStore } from "@/modules/pricing/pricing.repository";
import type { BlockOrderEntry } from "@/modules/pricing/pricing.type";
import type {
  IRevokedRefreshToken,
  IUser,
} from "@/modules/user/user.interface";
import type { UserStore } from "@/modules/user/user.repository";

type Identified = { _id: Types.ObjectId };

/**
 * Plain field assignment; operators and undefined values are ignored.
 */
function applyUpdate<T extends object>(doc: T, data: object): T {
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined && !key.startsWith("$")) {
      Reflect.set(doc, key, value);
    }
  }
  return doc;
}

class InMemoryCollection<T extends Identified> {
  readonly docs: T[] = [];
  lastFilter: FilterQuery<T> | null = null;

  constructor(private readonly build: (data: Partial<T>) => T) {}

  seed(...docs: T[]): this {
    this.docs.push(...docs);
    return this;
  }

  get(id: string): T | null {
    return this.docs.find((doc) => doc._id.toString() === id) ?? null;
  }

  insert(data: Partial<T>): T {
    const doc = this.build(data);
    this.docs.push(doc);
    return doc;
  }

  update(id: string, data: object): T | null {
    const doc = this.get(id);
    return doc ? applyUpdate(doc, data) : null;
  }

  page(filter: FilterQuery<T>, options: PaginateOptions): PaginateResult<T> {
    this.lastFilter = filter;
    const limit = Number(options.limit ?? 10);
    return {
      docs: this.docs,
      totalDocs: this.docs.length,
      limit,
      page: 1,
      totalPages: 1,
      offset: 0,
      hasPrevPage: false,
      hasNextPage: false,
      prevPage: null,
      nextPage: null,
      pagingCounter: 1,
    };
  }
}

const now = () => new Date("2030-01-01T00:00:00.000Z");

export class InMemoryCleaningServiceStore implements CleaningServiceStore {
  readonly collection = new InMemoryCollection<ICleaningService>((data) => ({
    _id: new Types.ObjectId(),
    name: "",
    nameLower: "",
    isPublished: false,
    isDeleted: false,
    createdAt: now(),
    updatedAt: now(),
    ...data,
  }));

  async findActiveById(serviceId: string) {
    const service = this.collection.get(serviceId);
    return service && !service.isDeleted ? service : null;
  }

  async findByIds(ids: string[]) {
    return this.collection.docs.filter(
      (service) => !service.isDeleted && ids.includes(service._id.toString())
    );
  }

  async findByNameLower(nameLower: string) {
    return (
      this.collection.docs.find(
        (service) => !service.isDeleted && service.nameLower === nameLower
      ) ?? null
    );
  }

  async findActive(_filter: FilterQuery<ICleaningService> = {}) {
    return this.collection.docs.filter((service) => !service.isDeleted);
  }

  async create(data: Partial<ICleaningService>) {
    return this.collection.insert(data);
  }

  async updateById(serviceId: string, data: UpdateQuery<ICleaningService>) {
    return this.collection.update(serviceId, data);
  }

  async softDelete(serviceId: string) {
    return this.collection.update(serviceId, {
      isDeleted: true,
      deletedAt: now(),
    });
  }
}

export class InMemoryPricingBlockStore implements PricingBlockStore {
  readonly collection = new InMemoryCollection<IPricingBlock>((data) => ({
    _id: new Types.ObjectId(),
    serviceId: new Types.ObjectId(),
    name: "",
    kind: "quantity",
    semanticKey: "custom",
    order: 0,
    isRequired: true,
    isActive: true,
    createdAt: now(),
    updatedAt: now(),
    ...data,
  }));

  async findById(blockId: string) {
    return this.collection.get(blockId);
  }

  async findByService(
    serviceId: string,
    options: { includeInactive?: boolean } = {}
  ) {
    return this.collection.docs
      .filter(
        (block) =>
          block.serviceId.toString() === serviceId &&
          (options.includeInactive || block.isActive)
      )
      .sort((a, b) => a.order - b.order);
  }

  async create(data: Partial<IPricingBlock>) {
    return this.collection.insert(data);
  }

  async updateById(blockId: string, data: UpdateQuery<IPricingBlock>) {
    return this.collection.update(blockId, data);
  }

  async reorder(serviceId: string, entries: BlockOrderEntry[]) {
    let matched = 0;
    for (const entry of entries) {
      const block = this.collection.get(entry.blockId);
      if (block && block.serviceId.toString() === serviceId) {
        block.order = entry.order;
        matched++;
      }
    }
    return matched;
  }
}

export class InMemoryOrderStore implements OrderStore {
  readonly collection = new InMemoryCollection<IOrder>((data) => ({
    _id: new Types.ObjectId(),
    clientId: new Types.ObjectId(),
    scheduledDate: "",
    scheduledTime: "",
    totalDurationMinutes: 0,
    totalPrice: 0,
    status: "pending_confirmation",
    cleanerId: null,
    items: [],
    createdAt: now(),
    updatedAt: now(),
    ...data,
  }));

  async findById(orderId: string) {
    return this.collection.get(orderId);
  }

  async findForClient(orderId: string, clientId: string) {
    const order = this.collection.get(orderId);
    return order && order.clientId.toString() === clientId ? order : null;
  }

  async findActiveOnDate(
    scheduledDate: string,
    options: { cleanerId?: string } = {}
  ) {
    return this.collection.docs.filter(
      (order) =>
        order.scheduledDate === scheduledDate &&
        SLOT_HOLDING_STATUSES.includes(order.status) &&
        (!options.cleanerId ||
          order.cleanerId?.toString() === options.cleanerId)
    );
  }

  async create(data: Partial<IOrder>) {
    return this.collection.insert(data);
  }

  async updateStatus(
    orderId: string,
    from: OrderStatus,
    to: OrderStatus,
    notes?: string
  ) {
    const order = this.collection.get(orderId);
    if (!order || order.status !== from) return null;
    return this.collection.update(
      orderId,
      notes === undefined ? { status: to } : { status: to, notes }
    );
  }

  async assignCleaner(orderId: string, cleanerId: string) {
    const order = this.collection.get(orderId);
    if (!order || !SLOT_HOLDING_STATUSES.includes(order.status)) return null;
    return this.collection.update(orderId, {
      cleanerId: new Types.ObjectId(cleanerId),
    });
  }

  async paginate(filter: FilterQuery<IOrder>, options: PaginateOptions) {
    return this.collection.page(filter, options);
  }

  async isServiceReferenced(serviceId: string) {
    return this.collection.docs.some((order) =>
      order.items.some((item) => item.serviceId.toString() === serviceId)
    );
  }
}

export class InMemoryBookingLockStore implements BookingLockStore {
  readonly versions = new Map<string, number>();

  async acquire(key: string) {
    this.versions.set(key, (this.versions.get(key) ?? 0) + 1);
  }
}

export class InMemoryUserStore implements UserStore {
  readonly collection = new InMemoryCollection<IUser>((data) => ({
    _id: new Types.ObjectId(),
    email: "",
    fullName: "",
    role: "client",
    accountStatus: "pending",
    emailVerified: false,
    emailVerificationAttempts: 0,
    passwordResetAttempts: 0,
    failedLoginAttempts: 0,
    lockedUntil: null,
    revokedRefreshTokens: [],
    serviceIds: [],
    isDeleted: false,
    createdAt: now(),
    updatedAt: now(),
    ...data,
  }));

  async findById(userId: string) {
    return this.collection.get(userId);
  }

  async findByEmail(email: string) {
    return (
      this.collection.docs.find(
        (user) => user.email === email.toLowerCase() && !user.isDeleted
      ) ?? null
    );
  }

  async findByEmailWithPassword(email: string) {
    return this.findByEmail(email);
  }

  async findByIdWithPassword(userId: string) {
    return this.collection.get(userId);
  }

  async findCleanerById(cleanerId: string) {
    const user = this.collection.get(cleanerId);
    return user && user.role === "cleaner" ? user : null;
  }

  async create(data: Partial<IUser>) {
    return this.collection.insert(data);
  }

  async updateById(userId: string, data: UpdateQuery<IUser>) {
    return this.collection.update(userId, data);
  }

  async paginate(filter: FilterQuery<IUser>, options: PaginateOptions) {
    return this.collection.page(filter, options);
  }

  async setVerificationCode(userId: string, codeHash: string, expiresAt: Date) {
    this.collection.update(userId, {
      emailVerificationCodeHash: codeHash,
      emailVerificationExpiresAt: expiresAt,
      emailVerificationAttempts: 0,
    });
  }

  async incrementVerificationAttempts(userId: string) {
    const user = this.collection.get(userId);
    if (user) user.emailVerificationAttempts += 1;
  }

  async markEmailAsVerified(userId: string) {
    const user = this.collection.get(userId);
    if (user) {
      user.emailVerified = true;
      user.accountStatus = "active";
      user.emailVerificationCodeHash = undefined;
      user.emailVerificationExpiresAt = undefined;
    }
  }

  async setPasswordResetCode(userId: string, codeHash: string, expiresAt: Date) {
    this.collection.update(userId, {
      passwordResetCodeHash: codeHash,
      passwordResetExpiresAt: expiresAt,
      passwordResetAttempts: 0,
    });
  }

  async incrementPasswordResetAttempts(userId: string) {
    const user = this.collection.get(userId);
    if (user) user.passwordResetAttempts += 1;
  }

  async completePasswordReset(
    userId: string,
    hashedPassword: string,
    changedAt: Date
  ) {
    const user = this.collection.get(userId);
    if (user) {
      user.password = hashedPassword;
      user.passwordChangedAt = changedAt;
      user.passwordResetAttempts = 0;
      user.failedLoginAttempts = 0;
      user.lockedUntil = null;
      user.passwordResetCodeHash = undefined;
      user.passwordResetExpiresAt = undefined;
    }
  }

  async recordFailedLogin(
    userId: string,
    attempts: number,
    lockedUntil: Date | null
  ) {
    this.collection.update(userId, {
      failedLoginAttempts: attempts,
      lockedUntil,
    });
  }

  async recordSuccessfulLogin(userId: string, at: Date) {
    const user = this.collection.get(userId);
    if (user) {
      user.failedLoginAttempts = 0;
      user.lockedUntil = null;
      user.lastLoginAt = at;
    }
  }

  async updatePassword(userId: string, hashedPassword: string, changedAt: Date) {
    this.collection.update(userId, {
      password: hashedPassword,
      passwordChangedAt: changedAt,
    });
  }

  async revokeRefreshToken(userId: string, entry: IRevokedRefreshToken) {
    this.collection.get(userId)?.revokedRefreshTokens.push(entry);
  }

  async isRefreshTokenRevoked(userId: string, tokenHash: string) {
    const user = this.collection.get(userId);
    return Boolean(
      user?.revokedRefreshTokens.some((entry) => entry.tokenHash === tokenHash)
    );
  }
}

/**
 * Records every message instead of sending it.
 */
export class RecordingNotifier {
  readonly sent: { kind: string; to: string; payload: object }[] = [];
  lastVerificationCode: string | null = null;
  lastPasswordResetCode: string | null = null;

  constructor(private readonly delivers = true) {}

  private record(kind: string, payload: { to: string }): Promise<boolean> {
    this.sent.push({ kind, to: payload.to, payload });
    return Promise.resolve(this.delivers);
  }

  sendEmailVerification(payload: {
    to: string;
    userName: string;
    verificationCode: string;
    expiresInMinutes: number;
  }) {
    this.lastVerificationCode = payload.verificationCode;
    return this.record("verification", payload);
  }

  sendPasswordResetCode(payload: {
    to: string;
    userName: string;
    resetCode: string;
    expiresInMinutes: number;
  }) {
    this.lastPasswordResetCode = payload.resetCode;
    return this.record("password-reset", payload);
  }

  sendWelcomeEmail(payload: {
    to: string;
    userName: string;
    userType: string;
    loginLink: string;
  }) {
    return this.record("welcome", payload);
  }

  sendAccountCredentials(payload: {
    to: string;
    userName: string;
    userType: string;
    password: string;
  }) {
    return this.record("credentials", payload);
  }

  sendPasswordChangeNotification(payload: {
    to: string;
    userName: string;
    changedAt: Date;
  }) {
    return this.record("password-changed", payload);
  }

  sendOrderReceived(payload: {
    to: string;
    userName: string;
    orderId: string;
    scheduledDate: string;
    scheduledTime: string;
    totalPrice: number;
    estimatedTimeMinutes: number;
  }) {
    return this.record("order-received", payload);
  }

  sendOrderStatusChanged(payload: {
    to: string;
    userName: string;
    orderId: string;
    scheduledDate: string;
    scheduledTime: string;
    status: string;
  }) {
    return this.record("order-status", payload);
  }

  sendCleanerAssigned(payload: {
    to: string;
    userName: string;
    orderId: string;
    scheduledDate: string;
    scheduledTime: string;
    address?: string;
  }) {
    return this.record("cleaner-assigned", payload);
  }

  kinds(): string[] {
    return this.sent.map((entry) => entry.kind);
  }
}
