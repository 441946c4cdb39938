// file: src/utils/pagination-helper.ts

import type { PaginateOptions, PaginateResult } from "mongoose";

import type {
  PaginatedResponse,
  PaginationQuery,
} from "@/ts/pagination.types";

import { PAGINATION } from "@/constants/app.constants";
import { ErrorCodeEnum } from "@/enums/error-code.enum";

import { BadRequestException } from "./app-error.utils";

export class PaginationHelper {
  static parsePaginationParams(query: PaginationQuery): PaginateOptions {
    const page = Math.max(1, Math.floor(query.page || PAGINATION.DEFAULT_PAGE));

    const limit = Math.min(
      Math.max(1, Math.floor(query.limit || PAGINATION.DEFAULT_LIMIT)),
      PAGINATION.MAX_LIMIT
    );

    if (page > 10000) {
      throw new BadRequestException(
        "Page number too large",
        ErrorCodeEnum.PAGINATION_INVALID_PAGE
      );
    }

    const sort = query.sort
      ? this.parseSortString(query.sort)
      : { createdAt: -1 };

    return { page, limit, sort };
  }

  static parseSortString(sortString: string): Record<string, 1 | -1> {
    const sortObj: Record<string, 1 | -1> = {};
    const fields = sortString
      .split(",")
      .map((field) => field.trim())
      .filter(Boolean);

    for (const field of fields) {
      if (field.startsWith("-")) {
        const fieldName = field.substring(1);
        if (fieldName) {
          sortObj[fieldName] = -1;
        }
      } else {
        sortObj[field] = 1;
      }
    }

    return Object.keys(sortObj).length > 0 ? sortObj : { createdAt: -1 };
  }

  static formatResponse<TDoc, TOut>(
    result: PaginateResult<TDoc>,
    map: (doc: TDoc) => TOut
  ): PaginatedResponse<TOut> {
    return {
      data: result.docs.map(map),
      pagination: {
        currentPage: result.page ?? 1,
        totalPages: result.totalPages,
        totalItems: result.totalDocs,
        itemsPerPage: result.limit,
        hasNext: result.hasNextPage,
        hasPrev: result.hasPrevPage,
        nextPage: result.nextPage ?? null,
        prevPage: result.prevPage ?? null,
        slNo: result.pagingCounter,
      },
    };
  }
}
