/**
 * Zod validation helpers.
 *
 * Parse a JSON request body or the query string against a Zod schema.
 * Failures throw a ZodError (or InvalidJsonError), which the error
 * handler answers with 400.
 */

import type { Context } from "hono";
import type { z } from "zod";

export class InvalidJsonError extends Error {
  constructor() {
    super("Invalid JSON in request body");
    this.name = "InvalidJsonError";
  }
}

/**
 * Read and validate the JSON body. An empty body validates as `{}`.
 */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
): Promise<z.output<S>> {
  const text = await c.req.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      throw new InvalidJsonError();
    }
  }
  return schema.parse(body);
}

export function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): z.output<S> {
  return schema.parse(c.req.query());
}

