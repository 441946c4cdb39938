// file: src/modules/user/user.service.ts

import type { FilterQuery } from "mongoose";
import { Types } from "mongoose";

import { ACCOUNT_STATUS, MESSAGES, ROLES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { logger } from "@/middlewares/pino-logger";
import {
  CleaningServiceRepository,
  type CleaningServiceStore,
} from "@/modules/cleaning-service/cleaning-service.repository";
import { EmailService } from "@/services/email.service";
import type { PaginatedResponse } from "@/ts/pagination.types";
import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from "@/utils/app-error.utils";
import { PaginationHelper } from "@/utils/pagination-helper";
import {
  generateRandomPassword,
  hashPassword,
} from "@/utils/password.utils";

import type { IUser } from "./user.interface";
import { UserRepository, type UserStore } from "./user.repository";
import type {
  CleanerCreatePayload,
  CleanerCreationResult,
  CleanerListQuery,
  UpdateProfilePayload,
  UserCreatePayload,
  UserResponse,
} from "./user.type";

export type UserNotifier = Pick<
  EmailService,
  "sendAccountCredentials" | "sendPasswordChangeNotification"
>;

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export class UserService {
  private userRepository: UserStore;
  private services: CleaningServiceStore;
  private emailService: UserNotifier;

  constructor(
    userRepository: UserStore = new UserRepository(),
    services: CleaningServiceStore = new CleaningServiceRepository(),
    emailService: UserNotifier = new EmailService()
  ) {
    this.userRepository = userRepository;
    this.services = services;
    this.emailService = emailService;
  }

  toUserResponse(user: IUser): UserResponse {
    return {
      _id: user._id.toString(),
      email: user.email,
      fullName: user.fullName,
      phone: user.phoneNumber || "",
      address: user.address || "",
      role: user.role,
      accountStatus: user.accountStatus,
      emailVerified: user.emailVerified,
      serviceIds:
        user.role === ROLES.CLEANER
          ? user.serviceIds.map((id) => id.toString())
          : undefined,
      lastLoginAt: user.lastLoginAt,
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }

  async createUser(payload: UserCreatePayload): Promise<IUser> {
    const email = payload.email.toLowerCase();
    const existing = await this.userRepository.findByEmail(email);
    if (existing) {
      throw new ConflictException(
        MESSAGES.AUTH.EMAIL_ALREADY_EXISTS,
        ErrorCodeEnum.AUTH_EMAIL_ALREADY_EXISTS
      );
    }

    return this.userRepository.create({
      email,
      password: await hashPassword(payload.password),
      fullName: payload.fullName,
      phoneNumber: payload.phoneNumber,
      address: payload.address,
      role: payload.role,
      emailVerified: payload.emailVerified ?? false,
      accountStatus: payload.accountStatus ?? ACCOUNT_STATUS.PENDING,
    });
  }

  /**
   * Creates an active cleaner with a generated password and mails the
   * credentials. The password is returned only when the mail was not sent.
   */
  async createCleaner(
    payload: CleanerCreatePayload
  ): Promise<CleanerCreationResult> {
    const serviceIds = Array.from(new Set(payload.serviceIds ?? []));
    if (serviceIds.length > 0) {
      const found = await this.services.findByIds(serviceIds);
      if (found.length !== serviceIds.length) {
        throw new BadRequestException(
          "One or more services do not exist",
          ErrorCodeEnum.SERVICE_NOT_FOUND
        );
      }
    }

    const temporaryPassword = generateRandomPassword();
    const cleaner = await this.createUser({
      email: payload.email,
      password: temporaryPassword,
      fullName: payload.fullName,
      phoneNumber: payload.phoneNumber,
      role: ROLES.CLEANER,
      emailVerified: true,
      accountStatus: ACCOUNT_STATUS.ACTIVE,
    });

    const withServices =
      serviceIds.length > 0
        ? await this.userRepository.updateById(cleaner._id.toString(), {
            serviceIds: serviceIds.map((id) => new Types.ObjectId(id)),
          })
        : cleaner;

    const emailSent = await this.emailService.sendAccountCredentials({
      to: cleaner.email,
      userName: cleaner.fullName,
      userType: cleaner.role,
      password: temporaryPassword,
    });
    if (!emailSent) {
      logger.warn(
        { cleanerId: cleaner._id.toString() },
        "Cleaner credentials were not emailed"
      );
    }

    return {
      cleaner: this.toUserResponse(withServices ?? cleaner),
      emailSent,
      temporaryPassword: emailSent ? undefined : temporaryPassword,
    };
  }

  async listCleaners(
    query: CleanerListQuery
  ): Promise<PaginatedResponse<UserResponse>> {
    const filter: FilterQuery<IUser> = {
      role: ROLES.CLEANER,
      isDeleted: { $ne: true },
    };

    if (query.search) {
      const pattern = new RegExp(escapeRegExp(query.search), "i");
      filter.$or = [{ fullName: pattern }, { email: pattern }];
    }

    if (query.serviceId) {
      filter.serviceIds = new Types.ObjectId(query.serviceId);
    }

    const options = PaginationHelper.parsePaginationParams(query);
    const result = await this.userRepository.paginate(filter, options);
    return PaginationHelper.formatResponse(result, (user) =>
      this.toUserResponse(user)
    );
  }

  async getProfile(userId: string): Promise<UserResponse> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new NotFoundException(
        MESSAGES.USER.USER_NOT_FOUND,
        ErrorCodeEnum.AUTH_USER_NOT_FOUND
      );
    }

    return this.toUserResponse(user);
  }

  async updateProfile(
    userId: string,
    payload: UpdateProfilePayload
  ): Promise<UserResponse> {
    const updated = await this.userRepository.updateById(userId, {
      fullName: payload.fullName,
      phoneNumber: payload.phoneNumber,
      address: payload.address,
    });
    if (!updated) {
      throw new NotFoundException(
        MESSAGES.USER.USER_NOT_FOUND,
        ErrorCodeEnum.AUTH_USER_NOT_FOUND
      );
    }

    return this.toUserResponse(updated);
  }

  async notifyPasswordChange(user: IUser, changedAt: Date): Promise<void> {
    await this.emailService.sendPasswordChangeNotification({
      to: user.email,
      userName: user.fullName,
      changedAt,
    });
  }
}
