// file: src/utils/base-schema.utils.ts

import { mongoosePaginate } from "@/config/paginate.config";
import type { SchemaDefinition } from "mongoose";
import { Schema } from "mongoose";

/**
 * Standard schema factory: timestamps on, pagination plugin applied.
 * Further options go through `schema.set` on the returned schema.
 */
export class BaseSchemaUtil {
  static createSchema<T>(definition: SchemaDefinition<T>): Schema<T> {
    const schema = new Schema<T>(definition, {
      timestamps: true,
    });

    schema.plugin(mongoosePaginate);

    return schema;
  }

  static softDeleteFields() {
    return {
      isDeleted: { type: Boolean, default: false, index: true },
      deletedAt: { type: Date, index: true },
    } as const;
  }

  static statusField<TStatus extends string>(enumValues: readonly TStatus[]) {
    return {
      status: {
        type: String,
        enum: [...enumValues],
        default: enumValues[0],
        index: true,
      },
    } as const;
  }
}
