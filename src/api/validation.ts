import type { Context } from "hono";
import type { z } from "zod";
import { validationError } from "../domain/errors.js";

export interface ParseBodyOptions {
  /** Treat a missing or blank body as `{}`. */
  optional?: boolean;
}

/** Parse and validate a JSON request body. Throws VALIDATION ("Validation failed") on bad input. */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  options: ParseBodyOptions = {},
): Promise<z.infer<S>> {
  let body: unknown;
  const raw = await c.req.text();
  if (options.optional && raw.trim() === "") {
    body = {};
  } else {
    try {
      body = JSON.parse(raw);
    } catch {
      throw validationError("Invalid JSON body");
    }
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const { formErrors, fieldErrors } = parsed.error.flatten();
    throw validationError("Validation failed", { formErrors, fieldErrors });
  }
  return parsed.data;
}
