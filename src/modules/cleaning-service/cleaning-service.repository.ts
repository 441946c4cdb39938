import type { FilterQuery, UpdateQuery } from "mongoose";

import { BaseRepository } from "@/modules/base/base.repository";

import type { ICleaningService } from "./cleaning-service.interface";
import { CleaningService } from "./cleaning-service.model";

export interface CleaningServiceStore {
  findActiveById(serviceId: string): Promise<ICleaningService | null>;
  findByIds(ids: string[]): Promise<ICleaningService[]>;
  findByNameLower(nameLower: string): Promise<ICleaningService | null>;
  findActive(filter?: FilterQuery<ICleaningService>): Promise<ICleaningService[]>;
  create(data: Partial<ICleaningService>): Promise<ICleaningService>;
  updateById(
    serviceId: string,
    data: UpdateQuery<ICleaningService>
  ): Promise<ICleaningService | null>;
  softDelete(serviceId: string): Promise<ICleaningService | null>;
}

export class CleaningServiceRepository
  extends BaseRepository<ICleaningService>
  implements CleaningServiceStore
{
  constructor() {
    super(CleaningService);
  }

  async findActiveById(serviceId: string) {
    return this.model.findOne({ _id: serviceId, isDeleted: false }).exec();
  }

  async findByNameLower(nameLower: string) {
    return this.model.findOne({ nameLower, isDeleted: false }).exec();
  }

  async findActive(filter: FilterQuery<ICleaningService> = {}) {
    return this.model
      .find({ ...filter, isDeleted: false })
      .sort({ name: 1 })
      .exec();
  }

  async findByIds(ids: string[]) {
    return this.model.find({ _id: { $in: ids }, isDeleted: false }).exec();
  }
}
