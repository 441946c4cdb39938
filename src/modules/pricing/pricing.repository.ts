// file: src/modules/pricing/pricing.repository.ts

import { Types, type UpdateQuery } from "mongoose";

import { BaseRepository } from "@/modules/base/base.repository";

import type { IPricingBlock } from "./pricing.interface";
import { PricingBlock } from "./pricing.model";
import type { BlockOrderEntry } from "./pricing.type";

export interface PricingBlockStore {
  findById(blockId: string): Promise<IPricingBlock | null>;
  findByService(
    serviceId: string,
    options?: { includeInactive?: boolean }
  ): Promise<IPricingBlock[]>;
  create(data: Partial<IPricingBlock>): Promise<IPricingBlock>;
  updateById(
    blockId: string,
    data: UpdateQuery<IPricingBlock>
  ): Promise<IPricingBlock | null>;
  reorder(serviceId: string, entries: BlockOrderEntry[]): Promise<number>;
}

export class PricingBlockRepository
  extends BaseRepository<IPricingBlock>
  implements PricingBlockStore
{
  constructor() {
    super(PricingBlock);
  }

  /**
   * Blocks in display order; active only unless asked otherwise.
   */
  async findByService(
    serviceId: string,
    options: { includeInactive?: boolean } = {}
  ) {
    const filter = options.includeInactive
      ? { serviceId }
      : { serviceId, isActive: true };

    return this.model.find(filter).sort({ order: 1, createdAt: 1 }).exec();
  }

  async reorder(serviceId: string, entries: BlockOrderEntry[]) {
    if (entries.length === 0) {
      return 0;
    }

    const serviceObjectId = new Types.ObjectId(serviceId);
    const result = await this.model.bulkWrite(
      entries.map((entry) => ({
        updateOne: {
          filter: {
            _id: new Types.ObjectId(entry.blockId),
            serviceId: serviceObjectId,
          },
          update: { $set: { order: entry.order } },
        },
      }))
    );

    return result.matchedCount;
  }
}
