import { getDateOffset, getTodaysDate } from "./dates.js";
import { uploadRecipeImage, uploadRecipeImageBase64 } from "./images.js";
import { createMealPlan, deleteMealPlan, getMealPlans, getTodaysMeals } from "./mealPlans.js";
import { createRecipe, deleteRecipe, getRecipe, parseIngredient, searchRecipes, updateRecipe } from "./recipes.js";
import { ToolRegistry } from "./registry.js";
import {
  createShoppingListItem,
  deleteShoppingListItem,
  getShoppingList,
  getShoppingLists,
  updateShoppingListItem,
} from "./shoppingLists.js";
import type { ToolDefinition } from "./types.js";

export const ALL_TOOLS: readonly ToolDefinition[] = [
  getTodaysDate,
  getDateOffset,
  searchRecipes,
  getRecipe,
  createRecipe,
  updateRecipe,
  deleteRecipe,
  parseIngredient,
  uploadRecipeImage,
  uploadRecipeImageBase64,
  getTodaysMeals,
  getMealPlans,
  createMealPlan,
  deleteMealPlan,
  getShoppingLists,
  getShoppingList,
  createShoppingListItem,
  updateShoppingListItem,
  deleteShoppingListItem,
];

/** Built once at startup; nothing registers tools after this. */
export function buildToolRegistry(tools: readonly ToolDefinition[] = ALL_TOOLS): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) registry.register(tool);
  return registry;
}
