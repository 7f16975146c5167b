import { z } from "zod";
import type { MealPlanInput } from "../mealie/types.js";
import { addDays, isoDate } from "./dates.js";
import { defineTool } from "./types.js";
import { DateString, deletedShape, MealPlanEntryShape, PageArgs, pageFields, pageMeta, toMealPlanEntry } from "./shapes.js";

const ENTRY_TYPES = ["breakfast", "lunch", "dinner", "side", "snack"] as const;

export const getTodaysMeals = defineTool({
  name: "get_todays_meals",
  description: "Get all meal plan entries for today.",
  input: z.object({}),
  output: z.object({ date: z.string(), meals: z.array(MealPlanEntryShape) }),
  async execute(_args, { client, signal, now }) {
    const meals = await client.getTodaysMeals(signal);
    return { date: isoDate(now()), meals: meals.map(toMealPlanEntry) };
  },
});

export const getMealPlans = defineTool({
  name: "get_meal_plans",
  description: "Get meal plan entries in a date range. Defaults to today through seven days from today.",
  input: z.object({
    start_date: DateString.optional(),
    end_date: DateString.optional(),
    ...PageArgs,
  }),
  output: z.object({
    start_date: z.string(),
    end_date: z.string(),
    items: z.array(MealPlanEntryShape),
    ...pageFields,
  }),
  async execute(args, { client, signal, now }) {
    const today = now();
    const startDate = args.start_date ?? isoDate(today);
    const endDate = args.end_date ?? isoDate(addDays(today, 7));
    const result = await client.getMealPlans(
      { startDate, endDate, page: args.page, pageSize: args.page_size },
      signal,
    );
    return {
      start_date: startDate,
      end_date: endDate,
      items: result.items.map(toMealPlanEntry),
      ...pageMeta(result),
    };
  },
});

export const createMealPlan = defineTool({
  name: "create_meal_plan",
  description: "Add a meal plan entry for a date, either linked to a recipe (by slug) or with a free-text title.",
  input: z
    .object({
      date: DateString,
      entry_type: z.enum(ENTRY_TYPES).describe("Meal slot: breakfast, lunch, dinner, side or snack."),
      recipe_slug: z.string().min(1).optional().describe("Slug of an existing recipe to link."),
      title: z.string().min(1).optional().describe("Free-text title when no recipe is linked."),
    })
    .refine((args) => args.recipe_slug !== undefined || args.title !== undefined, {
      message: "Provide recipe_slug or title",
      path: ["recipe_slug"],
    }),
  output: MealPlanEntryShape,
  async execute(args, { client, signal }) {
    const entry: MealPlanInput = { date: args.date, entryType: args.entry_type };
    if (args.recipe_slug) {
      const recipe = await client.getRecipe(args.recipe_slug, signal);
      entry.recipeId = recipe.id;
    }
    if (args.title) entry.title = args.title;
    const created = await client.createMealPlan(entry, signal);
    console.error(`[Info] Added meal plan entry ${created.id} for ${args.date} (${args.entry_type})`);
    return toMealPlanEntry(created);
  },
});

export const deleteMealPlan = defineTool({
  name: "delete_meal_plan",
  description: "Delete a meal plan entry.",
  input: z.object({
    item_id: z.number().int().positive().describe("ID of the meal plan entry."),
  }),
  output: deletedShape(z.number().int()),
  async execute(args, { client, signal }) {
    await client.deleteMealPlan(args.item_id, signal);
    return { id: args.item_id, deleted: true as const };
  },
});
