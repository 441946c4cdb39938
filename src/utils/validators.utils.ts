// file: src/utils/validators.utils.ts
import type { Request } from "express";
import { z, type ZodTypeAny } from "zod";

/**
 * Validates `{ body, query, params, cookies, headers }` against `schema`.
 * A `ZodError` propagates to the error handler as a 400.
 */
export async function zParse<T extends ZodTypeAny>(
  schema: T,
  req: Request
): Promise<z.infer<T>> {
  return schema.parseAsync({
    body: req.body,
    query: req.query,
    params: req.params,
    cookies: req.cookies,
    headers: req.headers,
  });
}

export const objectIdSchema = z
  .string()
  .regex(/^[a-f\d]{24}$/i, "Invalid identifier");
