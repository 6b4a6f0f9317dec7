/**
 * Zod helpers shared by the config loader and the registry client.
 */
import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * In Zod 4, .default({}) skips the inner defaults of an object, so missing
 * (undefined or null) sections are replaced with {} before parsing.
 */
export function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/**
 * Format Zod issues into a single readable line.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map((segment) => String(segment)).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
