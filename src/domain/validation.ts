import type { ZodType, ZodTypeDef } from "zod";
import { SchemaError } from "../core/errors.js";

/**
 * Parse untyped input at the boundary. Every zod issue becomes one line of
 * the SchemaError so a maintainer sees all problems in a file at once.
 */
export function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  origin: string,
): T {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
  throw new SchemaError(origin, issues);
}
