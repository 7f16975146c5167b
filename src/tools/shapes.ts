import { z } from "zod";
import type { Page } from "../mealie/pagination.js";
import type { MealPlanEntry, NamedRef, ShoppingListItem } from "../mealie/types.js";

// Output shapes shared by several tools, and the mappers that fill them.

export const PageArgs = {
  page: z.number().int().min(1).default(1).describe("Page number, starting at 1."),
  page_size: z.number().int().min(1).max(100).default(20).describe("Results per page (1-100)."),
};

export const DateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD")
  .describe("Date in YYYY-MM-DD format.");

export const pageFields = {
  page: z.number().int(),
  total_pages: z.number().int(),
  total: z.number().int(),
};

export function pageMeta<T>(page: Page<T>) {
  return { page: page.page, total_pages: page.totalPages, total: page.total };
}

export const RecipeRefShape = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
});

export const MealPlanEntryShape = z.object({
  id: z.number().int(),
  date: z.string(),
  entry_type: z.string(),
  title: z.string().nullish(),
  recipe: RecipeRefShape.nullable(),
});

export function toMealPlanEntry(entry: MealPlanEntry): z.input<typeof MealPlanEntryShape> {
  return {
    id: entry.id,
    date: entry.date,
    entry_type: entry.entryType,
    title: entry.title,
    recipe: entry.recipe ? { id: entry.recipe.id, slug: entry.recipe.slug, name: entry.recipe.name } : null,
  };
}

export const ShoppingListItemShape = z.object({
  id: z.string(),
  list_id: z.string(),
  note: z.string().nullish(),
  quantity: z.number().nullish(),
  checked: z.boolean(),
  display: z.string().nullish(),
  unit: z.string().nullish(),
  food: z.string().nullish(),
});

export function refName(ref: NamedRef | null | undefined): string | null {
  return ref ? ref.name : null;
}

export function toShoppingListItem(item: ShoppingListItem): z.input<typeof ShoppingListItemShape> {
  return {
    id: item.id,
    list_id: item.shoppingListId,
    note: item.note,
    quantity: item.quantity,
    checked: item.checked,
    display: item.display,
    unit: refName(item.unit),
    food: refName(item.food),
  };
}

export function deletedShape<T extends z.ZodTypeAny>(id: T) {
  return z.object({ id, deleted: z.literal(true) });
}
