import { Types } from "mongoose";

import type { ICleaningService } from "@/modules/cleaning-service/cleaning-service.interface";
import type { IOrder } from "@/modules/order/order.interface";
import type {
  IPricingBlock,
  IQuantityOption,
  IToggleOption,
  ITypeOption,
} from "@/modules/pricing/pricing.interface";
import type { IUser } from "@/modules/user/user.interface";

const FIXED_DATE = new Date("2030-01-01T00:00:00.000Z");

function baseBlock(
  overrides: Partial<IPricingBlock>
): IPricingBlock {
  return {
    _id: new Types.ObjectId(),
    serviceId: new Types.ObjectId(),
    name: "Block",
    kind: "quantity",
    semanticKey: "custom",
    order: 0,
    isRequired: false,
    isActive: true,
    quantityOption: null,
    typeOption: null,
    toggleOption: null,
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    ...overrides,
  };
}

export function quantityBlock(
  option: Partial<IQuantityOption> & { unitPrice: number },
  overrides: Partial<IPricingBlock> = {}
): IPricingBlock {
  return baseBlock({
    name: option.name ?? "Items",
    kind: "quantity",
    quantityOption: {
      name: option.name ?? "Items",
      unitPrice: option.unitPrice,
      minQuantity: option.minQuantity ?? 1,
      maxQuantity: option.maxQuantity ?? 100,
      unitName: option.unitName ?? "pcs",
    },
    ...overrides,
  });
}

export function typeChoiceBlock(
  option: ITypeOption,
  overrides: Partial<IPricingBlock> = {}
): IPricingBlock {
  return baseBlock({
    name: option.name,
    kind: "type_choice",
    typeOption: option,
    ...overrides,
  });
}

export function toggleBlock(
  option: Partial<IToggleOption> & { percentageIncrease: number },
  overrides: Partial<IPricingBlock> = {}
): IPricingBlock {
  return baseBlock({
    name: option.name ?? "Extra",
    kind: "toggle",
    toggleOption: {
      name: option.name ?? "Extra",
      shortDescription: option.shortDescription ?? "Optional extra",
      fullDescription: option.fullDescription,
      percentageIncrease: option.percentageIncrease,
    },
    ...overrides,
  });
}

export function cleaningService(
  overrides: Partial<ICleaningService> = {}
): ICleaningService {
  const name = overrides.name ?? "Sofa cleaning";
  return {
    _id: new Types.ObjectId(),
    name,
    nameLower: name.toLowerCase(),
    isPublished: true,
    isDeleted: false,
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    ...overrides,
  };
}

export function order(overrides: Partial<IOrder> = {}): IOrder {
  return {
    _id: new Types.ObjectId(),
    clientId: new Types.ObjectId(),
    scheduledDate: "2030-06-10",
    scheduledTime: "14:00",
    totalDurationMinutes: 120,
    totalPrice: 100,
    status: "confirmed",
    cleanerId: null,
    items: [],
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    ...overrides,
  };
}

export function user(overrides: Partial<IUser> = {}): IUser {
  return {
    _id: new Types.ObjectId(),
    email: "client@example.com",
    fullName: "Test Client",
    role: "client",
    accountStatus: "active",
    emailVerified: true,
    emailVerificationAttempts: 0,
    passwordResetAttempts: 0,
    failedLoginAttempts: 0,
    lockedUntil: null,
    revokedRefreshTokens: [],
    serviceIds: [],
    isDeleted: false,
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    ...overrides,
  };
}
