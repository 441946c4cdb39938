// file: src/modules/base/base.repository.ts

import type {
  ClientSession,
  FilterQuery,
  PaginateModel,
  PaginateOptions,
  UpdateQuery,
} from "mongoose";

export class BaseRepository<T> {
  protected model: PaginateModel<T>;

  constructor(model: PaginateModel<T>) {
    this.model = model;
  }

  async findById(id: string) {
    return this.model.findById(id).exec();
  }

  async findOne(filter: FilterQuery<T> = {}) {
    return this.model.findOne(filter).exec();
  }

  async create(data: Partial<T>, session?: ClientSession) {
    const [created] = await this.model.create([data], { session });
    return created;
  }

  async updateById(
    id: string,
    data: UpdateQuery<T>,
    session?: ClientSession
  ) {
    return this.model
      .findByIdAndUpdate(id, data, { new: true, runValidators: true, session })
      .exec();
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }

  async paginate(filter: FilterQuery<T>, options: PaginateOptions) {
    return this.model.paginate(filter, options);
  }

  async countDocuments(filter: FilterQuery<T> = {}): Promise<number> {
    return this.model.countDocuments(filter).exec();
  }

  async softDelete(id: string) {
    return this.model
      .findByIdAndUpdate(
        id,
        { deletedAt: new Date(), isDeleted: true },
        { new: true }
      )
      .exec();
  }

  /**
   * Find documents matching query
   */
  async find(
    query: FilterQuery<T> = {},
    options: {
      skip?: number;
      limit?: number;
      sort?: Record<string, 1 | -1>;
      session?: ClientSession;
    } = {}
  ) {
    let queryBuilder = this.model.find(query);

    if (options.skip) {
      queryBuilder = queryBuilder.skip(options.skip);
    }

    if (options.limit) {
      queryBuilder = queryBuilder.limit(options.limit);
    }

    if (options.sort) {
      queryBuilder = queryBuilder.sort(options.sort);
    }

    if (options.session) {
      queryBuilder = queryBuilder.session(options.session);
    }

    return queryBuilder.exec();
  }

  async exists(query: FilterQuery<T>): Promise<boolean> {
    const count = await this.model.countDocuments(query).exec();
    return count > 0;
  }
}
