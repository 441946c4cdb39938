import { MESSAGES } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";
import { logger } from "@/middlewares/pino-logger";
import { OrderRepository } from "@/modules/order/order.repository";
import {
  ConflictException,
  NotFoundException,
} from "@/utils/app-error.utils";

import type { ICleaningService } from "./cleaning-service.interface";
import {
  CleaningServiceRepository,
  type CleaningServiceStore,
} from "./cleaning-service.repository";
import type {
  CleaningServiceCreatePayload,
  CleaningServiceResponse,
  CleaningServiceUpdatePayload,
} from "./cleaning-service.type";

export interface ServiceUsageLookup {
  isServiceReferenced(serviceId: string): Promise<boolean>;
}

export class CleaningServiceService {
  private repository: CleaningServiceStore;
  private usage: ServiceUsageLookup;

  constructor(
    repository: CleaningServiceStore = new CleaningServiceRepository(),
    usage: ServiceUsageLookup = new OrderRepository()
  ) {
    this.repository = repository;
    this.usage = usage;
  }

  async createService(
    payload: CleaningServiceCreatePayload
  ): Promise<CleaningServiceResponse> {
    const name = payload.name.trim();
    await this.assertNameAvailable(name);

    const service = await this.repository.create({
      name,
      nameLower: name.toLowerCase(),
      description: payload.description,
      beforeImage: payload.beforeImage,
      afterImage: payload.afterImage,
      isPublished: payload.isPublished ?? false,
    });

    logger.info({ serviceId: service._id.toString() }, "Service created");
    return this.toResponse(service);
  }

  async updateService(
    serviceId: string,
    payload: CleaningServiceUpdatePayload
  ): Promise<CleaningServiceResponse> {
    await this.getActiveOrThrow(serviceId);

    const update: Partial<ICleaningService> = {
      description: payload.description,
      beforeImage: payload.beforeImage,
      afterImage: payload.afterImage,
      isPublished: payload.isPublished,
    };

    if (payload.name) {
      const name = payload.name.trim();
      await this.assertNameAvailable(name, serviceId);
      update.name = name;
      update.nameLower = name.toLowerCase();
    }

    // undefined keys are dropped by mongoose
    const updated = await this.repository.updateById(serviceId, update);
    if (!updated) {
      throw new NotFoundException(
        MESSAGES.SERVICE.NOT_FOUND,
        ErrorCodeEnum.SERVICE_NOT_FOUND
      );
    }

    return this.toResponse(updated);
  }

  /**
   * Services referenced by an order stay; admins unpublish them instead.
   */
  async deleteService(serviceId: string): Promise<void> {
    await this.getActiveOrThrow(serviceId);

    if (await this.usage.isServiceReferenced(serviceId)) {
      throw new ConflictException(
        MESSAGES.SERVICE.IN_USE,
        ErrorCodeEnum.SERVICE_IN_USE
      );
    }

    await this.repository.softDelete(serviceId);
    logger.info({ serviceId }, "Service deleted");
  }

  async listPublishedServices(): Promise<CleaningServiceResponse[]> {
    const services = await this.repository.findActive({ isPublished: true });
    return services.map((service) => this.toResponse(service));
  }

  async listAllServices(): Promise<CleaningServiceResponse[]> {
    const services = await this.repository.findActive();
    return services.map((service) => this.toResponse(service));
  }

  async getPublishedService(serviceId: string): Promise<ICleaningService> {
    const service = await this.repository.findActiveById(serviceId);
    if (!service || !service.isPublished) {
      throw new NotFoundException(
        MESSAGES.SERVICE.UNAVAILABLE,
        ErrorCodeEnum.SERVICE_NOT_FOUND
      );
    }
    return service;
  }

  async getActiveOrThrow(serviceId: string): Promise<ICleaningService> {
    const service = await this.repository.findActiveById(serviceId);
    if (!service) {
      throw new NotFoundException(
        MESSAGES.SERVICE.NOT_FOUND,
        ErrorCodeEnum.SERVICE_NOT_FOUND
      );
    }
    return service;
  }

  toResponse(service: ICleaningService): CleaningServiceResponse {
    return {
      _id: service._id.toString(),
      name: service.name,
      description: service.description,
      beforeImage: service.beforeImage,
      afterImage: service.afterImage,
      isPublished: service.isPublished,
      createdAt: service.createdAt,
      updatedAt: service.updatedAt,
    };
  }

  private async assertNameAvailable(
    name: string,
    exceptServiceId?: string
  ): Promise<void> {
    const existing = await this.repository.findByNameLower(name.toLowerCase());
    if (existing && existing._id.toString() !== exceptServiceId) {
      throw new ConflictException("Service name must be unique");
    }
  }
}
