// file: src/config/paginate.config.ts
import type { PaginateOptions } from "mongoose";

import mongoosePaginate from "mongoose-paginate-v2";

export const defaultPaginateOptions: PaginateOptions = {
  page: 1,
  limit: 10,
  sort: { createdAt: -1 },
  pagination: true,
  allowDiskUse: true,
};

mongoosePaginate.paginate.options = defaultPaginateOptions;
export { mongoosePaginate };
