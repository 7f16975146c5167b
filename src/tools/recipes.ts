import { z } from "zod";
import type { RecipeIngredientInput, RecipePatch } from "../mealie/types.js";
import { defineTool } from "./types.js";
import { PageArgs, pageFields, pageMeta, refName } from "./shapes.js";

const splitList = (value: string | undefined): string[] | undefined => {
  const parts = value?.split(",").map((part) => part.trim()).filter((part) => part.length > 0);
  return parts && parts.length > 0 ? parts : undefined;
};

const IngredientArg = z.object({
  note: z.string().min(1).describe("Ingredient line, e.g. '2 cups flour'."),
  quantity: z.number().positive().optional(),
  unit: z.string().min(1).optional(),
});

const InstructionArg = z.object({
  text: z.string().min(1).describe("One instruction step."),
});

const recipeFields = {
  description: z.string().optional().describe("Short description of the recipe."),
  ingredients: z.array(IngredientArg).min(1).optional(),
  instructions: z.array(InstructionArg).min(1).optional(),
  prep_time: z.string().optional().describe("Preparation time, e.g. '15 minutes'."),
  cook_time: z.string().optional().describe("Cooking time, e.g. '30 minutes'."),
  servings: z.string().optional().describe("Yield, e.g. '4 servings'."),
};

type RecipeFields = {
  name?: string;
  description?: string;
  ingredients?: z.infer<typeof IngredientArg>[];
  instructions?: z.infer<typeof InstructionArg>[];
  prep_time?: string;
  cook_time?: string;
  servings?: string;
};

/** Only the fields the caller gave end up in the patch. */
function toRecipePatch(fields: RecipeFields): RecipePatch {
  const patch: RecipePatch = {};
  if (fields.name !== undefined) patch.name = fields.name;
  if (fields.description !== undefined) patch.description = fields.description;
  if (fields.ingredients) {
    patch.recipeIngredient = fields.ingredients.map(
      (ingredient): RecipeIngredientInput => ({
        note: ingredient.note,
        quantity: ingredient.quantity ?? null,
        unit: ingredient.unit ? { name: ingredient.unit } : null,
      }),
    );
  }
  if (fields.instructions) patch.recipeInstructions = fields.instructions.map(({ text }) => ({ text }));
  if (fields.prep_time !== undefined) patch.prepTime = fields.prep_time;
  if (fields.cook_time !== undefined) patch.performTime = fields.cook_time;
  if (fields.servings !== undefined) patch.recipeYield = fields.servings;
  return patch;
}

const RecipeSummaryShape = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  rating: z.number().nullish(),
  total_time: z.string().nullish(),
});

const SavedRecipeShape = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
});

export const searchRecipes = defineTool({
  name: "search_recipes",
  description: "Search recipes by text, categories and tags. Results are paginated.",
  input: z.object({
    query: z.string().optional().describe("Search term matched against recipe names and descriptions."),
    categories: z.string().optional().describe("Comma-separated category names."),
    tags: z.string().optional().describe("Comma-separated tag names."),
    ...PageArgs,
  }),
  output: z.object({ items: z.array(RecipeSummaryShape), ...pageFields }),
  async execute(args, { client, signal }) {
    const result = await client.searchRecipes(
      {
        search: args.query?.trim() || undefined,
        categories: splitList(args.categories),
        tags: splitList(args.tags),
        page: args.page,
        pageSize: args.page_size,
      },
      signal,
    );
    return {
      items: result.items.map((recipe) => ({
        id: recipe.id,
        slug: recipe.slug,
        name: recipe.name,
        description: recipe.description,
        rating: recipe.rating,
        total_time: recipe.totalTime,
      })),
      ...pageMeta(result),
    };
  },
});

export const getRecipe = defineTool({
  name: "get_recipe",
  description: "Get a recipe's full details: ingredients, instructions, times and metadata.",
  input: z.object({
    slug: z.string().min(1).describe("The recipe's slug."),
  }),
  output: z.object({
    id: z.string(),
    slug: z.string(),
    name: z.string(),
    description: z.string().nullish(),
    ingredients: z.array(
      z.object({
        note: z.string().nullish(),
        quantity: z.number().nullish(),
        unit: z.string().nullish(),
        food: z.string().nullish(),
      }),
    ),
    instructions: z.array(z.object({ text: z.string().nullish() })),
    prep_time: z.string().nullish(),
    cook_time: z.string().nullish(),
    total_time: z.string().nullish(),
    servings: z.string().nullish(),
    rating: z.number().nullish(),
    categories: z.array(z.string()),
    tags: z.array(z.string()),
    notes: z.array(z.string().nullish()),
  }),
  async execute(args, { client, signal }) {
    const recipe = await client.getRecipe(args.slug, signal);
    return {
      id: recipe.id,
      slug: recipe.slug,
      name: recipe.name,
      description: recipe.description,
      ingredients: (recipe.recipeIngredient ?? []).map((ingredient) => ({
        note: ingredient.note,
        quantity: ingredient.quantity,
        unit: refName(ingredient.unit),
        food: refName(ingredient.food),
      })),
      instructions: (recipe.recipeInstructions ?? []).map((step) => ({ text: step.text })),
      prep_time: recipe.prepTime,
      cook_time: recipe.performTime,
      total_time: recipe.totalTime,
      servings: recipe.recipeYield,
      rating: recipe.rating,
      categories: (recipe.recipeCategory ?? []).map((category) => category.name),
      tags: (recipe.tags ?? []).map((tag) => tag.name),
      notes: (recipe.notes ?? []).map((note) => note.text),
    };
  },
});

export const createRecipe = defineTool({
  name: "create_recipe",
  description: "Create a recipe with ingredients and instructions. Returns the new recipe's slug.",
  input: z.object({
    name: z.string().min(1).describe("Name of the recipe."),
    ...recipeFields,
    ingredients: z.array(IngredientArg).min(1),
    instructions: z.array(InstructionArg).min(1),
  }),
  output: SavedRecipeShape,
  async execute(args, { client, signal }) {
    const slug = await client.createRecipe(args.name, signal);
    console.error(`[Info] Created recipe "${args.name}" as ${slug}`);
    const recipe = await client.updateRecipe(slug, toRecipePatch(args), signal);
    return { id: recipe.id, slug: recipe.slug, name: recipe.name };
  },
});

export const updateRecipe = defineTool({
  name: "update_recipe",
  description: "Update an existing recipe. Only the fields given are changed; lists replace the existing ones.",
  input: z
    .object({
      slug: z.string().min(1).describe("Slug of the recipe to update."),
      name: z.string().min(1).optional().describe("New name."),
      ...recipeFields,
    })
    .refine(({ slug: _slug, ...fields }) => Object.values(fields).some((value) => value !== undefined), {
      message: "Provide at least one field to update",
    }),
  output: SavedRecipeShape,
  async execute(args, { client, signal }) {
    const recipe = await client.updateRecipe(args.slug, toRecipePatch(args), signal);
    return { id: recipe.id, slug: recipe.slug, name: recipe.name };
  },
});

export const deleteRecipe = defineTool({
  name: "delete_recipe",
  description: "Delete a recipe.",
  input: z.object({
    slug: z.string().min(1).describe("Slug of the recipe to delete."),
  }),
  output: z.object({ slug: z.string(), deleted: z.literal(true) }),
  async execute(args, { client, signal }) {
    await client.deleteRecipe(args.slug, signal);
    return { slug: args.slug, deleted: true as const };
  },
});

export const parseIngredient = defineTool({
  name: "parse_ingredient",
  description: "Parse a free-text ingredient line into quantity, unit and food using Mealie's parser.",
  input: z.object({
    text: z.string().min(1).describe("Ingredient line, e.g. '2 tbsp olive oil'."),
  }),
  output: z.object({
    note: z.string().nullish(),
    quantity: z.number().nullish(),
    unit: z.string().nullish(),
    food: z.string().nullish(),
  }),
  async execute(args, { client, signal }) {
    const ingredient = await client.parseIngredient(args.text, signal);
    return {
      note: ingredient.note,
      quantity: ingredient.quantity,
      unit: refName(ingredient.unit),
      food: refName(ingredient.food),
    };
  },
});
