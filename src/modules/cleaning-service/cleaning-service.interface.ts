import type { Types } from "mongoose";

export interface ICleaningService {
  _id: Types.ObjectId;
  name: string;
  nameLower: string;
  description?: string;
  beforeImage?: string;
  afterImage?: string;
  isPublished: boolean;
  isDeleted: boolean;
  deletedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}
