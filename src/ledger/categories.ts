import { readFileSync } from "node:fs";
import { z } from "zod";

/** Reserved category for both legs of a transfer. */
export const TRANSFER_CATEGORY = "transfer";

const categoryFileSchema = z.object({
  expense: z.array(z.string().min(1)),
  income: z.array(z.string().min(1)),
});

export type SuggestedCategories = z.infer<typeof categoryFileSchema> & {
  transfer: string;
};

const CATEGORIES_URL = new URL("../../data/categories.json", import.meta.url);

let cached: SuggestedCategories | null = null;

/**
 * Suggested categories for expenses and incomes. Any non-empty category
 * is accepted on a transaction; these are hints for clients.
 */
export function loadCategories(): SuggestedCategories {
  if (!cached) {
    const parsed = categoryFileSchema.parse(
      JSON.parse(readFileSync(CATEGORIES_URL, "utf8"))
    );
    cached = { ...parsed, transfer: TRANSFER_CATEGORY };
  }
  return cached;
}
