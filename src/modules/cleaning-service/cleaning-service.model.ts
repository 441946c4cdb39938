import type { PaginateModel } from "mongoose";
import { model } from "mongoose";

import { BaseSchemaUtil } from "@/utils/base-schema.utils";

import type { ICleaningService } from "./cleaning-service.interface";

const cleaningServiceSchema = BaseSchemaUtil.createSchema<ICleaningService>({
  ...BaseSchemaUtil.softDeleteFields(),
  name: {
    type: String,
    required: true,
    trim: true,
  },
  nameLower: {
    type: String,
    required: true,
  },
  description: {
    type: String,
    trim: true,
  },
  beforeImage: {
    type: String,
    trim: true,
  },
  afterImage: {
    type: String,
    trim: true,
  },
  isPublished: {
    type: Boolean,
    default: false,
    index: true,
  },
});

cleaningServiceSchema.index(
  { nameLower: 1 },
  { unique: true, partialFilterExpression: { isDeleted: false } }
);

export const CleaningService = model<
  ICleaningService,
  PaginateModel<ICleaningService>
>("CleaningService", cleaningServiceSchema);
