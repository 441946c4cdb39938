// file: src/utils/transaction.utils.ts

import type { ClientSession } from "mongoose";
import mongoose from "mongoose";

import { logger } from "@/middlewares/pino-logger";

export type TransactionRunner = <T>(
  callback: (session: ClientSession | undefined) => Promise<T>
) => Promise<T>;

const MAX_TRANSACTION_ATTEMPTS = 3;

export const isTransientTransactionError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoError &&
  error.hasErrorLabel("TransientTransactionError");

export class TransactionHelper {
  /**
   * Runs the callback in a transaction, re-running it when the server
   * reports a transient failure such as a write conflict.
   */
  static async withTransaction<T>(
    callback: (session: ClientSession | undefined) => Promise<T>
  ): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      const session = await mongoose.startSession();
      session.startTransaction({
        readConcern: { level: "snapshot" },
        writeConcern: { w: "majority" },
      });

      try {
        const result = await callback(session);
        await session.commitTransaction();
        return result;
      } catch (error) {
        if (session.inTransaction()) {
          await session.abortTransaction();
        }
        if (
          attempt < MAX_TRANSACTION_ATTEMPTS &&
          isTransientTransactionError(error)
        ) {
          logger.warn({ attempt }, "Retrying transaction after conflict");
          continue;
        }
        throw error;
      } finally {
        await session.endSession();
      }
    }
  }
}
