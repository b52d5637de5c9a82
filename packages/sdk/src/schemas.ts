/**
 * Zod schemas for validating entry input
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import type { FieldValue, RawFields } from "./types.js";
import { InvalidEntryError } from "./errors.js";

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(FieldValueSchema),
    z.record(z.string(), FieldValueSchema),
  ])
);

// Language code -> display string
export const NameTranslationsSchema = z.record(
  z.string().min(1, "language code must be non-empty"),
  z.string()
);

export const EntryIdSchema = z
  .number()
  .int("id must be an integer")
  .nonnegative("id must be non-negative")
  .max(Number.MAX_SAFE_INTEGER, "id must be a safe integer");

// Keeps the input's field order; `name` must be a language -> string map
export const RawFieldsSchema = z
  .record(z.string(), FieldValueSchema)
  .transform((fields, ctx): RawFields => {
    const names = NameTranslationsSchema.safeParse(fields.name);
    if (!names.success) {
      for (const issue of names.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["name", ...issue.path],
          message: issue.message,
        });
      }
      return z.NEVER;
    }
    return { ...fields, name: names.data };
  });

/**
 * Format zod issues as "path: message" fragments
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pointer = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${pointer}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate an entry id
 * @throws InvalidEntryError if the id is not a non-negative safe integer
 */
export function parseEntryId(id: unknown): number {
  const result = EntryIdSchema.safeParse(id);
  if (!result.success) {
    throw new InvalidEntryError(
      `Invalid entry id ${String(id)}: ${formatIssues(result.error)}`,
      result.error.issues
    );
  }
  return result.data;
}

/**
 * Validate a name map and return a frozen copy preserving its order
 * @throws InvalidEntryError if the value is not a language -> string map
 */
export function parseNameTranslations(value: unknown): Readonly<Record<string, string>> {
  const result = NameTranslationsSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidEntryError(
      `Invalid name field: ${formatIssues(result.error)}`,
      result.error.issues
    );
  }
  return Object.freeze({ ...result.data });
}
