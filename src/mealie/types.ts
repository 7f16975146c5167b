// --- Mealie API Types (Simplified) ---
// Only the fields the tools read are declared. Required fields are what the
// tools expect to be present; the output schemas check that at run time.

export interface NamedRef {
  id?: string;
  name: string;
}

export interface RecipeSummary {
  id: string;
  slug: string;
  name: string;
  description?: string | null;
  rating?: number | null;
  totalTime?: string | null;
}

export interface RecipeIngredient {
  note?: string | null;
  quantity?: number | null;
  unit?: NamedRef | null;
  food?: NamedRef | null;
  display?: string | null;
}

export interface RecipeInstruction {
  title?: string | null;
  text?: string | null;
}

export interface RecipeNote {
  title?: string | null;
  text?: string | null;
}

export interface Recipe extends RecipeSummary {
  recipeIngredient?: RecipeIngredient[];
  recipeInstructions?: RecipeInstruction[];
  prepTime?: string | null;
  performTime?: string | null;
  recipeYield?: string | null;
  recipeCategory?: NamedRef[];
  tags?: NamedRef[];
  notes?: RecipeNote[];
}

export interface RecipeIngredientInput {
  note: string;
  quantity?: number | null;
  unit?: { name: string } | null;
}

export interface RecipePatch {
  name?: string;
  description?: string;
  recipeIngredient?: RecipeIngredientInput[];
  recipeInstructions?: { text: string }[];
  prepTime?: string;
  performTime?: string;
  recipeYield?: string;
}

export type MealPlanEntryType = "breakfast" | "lunch" | "dinner" | "side" | "snack";

export interface MealPlanEntry {
  id: number;
  date: string;
  entryType: string;
  title?: string | null;
  text?: string | null;
  recipeId?: string | null;
  recipe?: RecipeSummary | null;
}

export interface MealPlanInput {
  date: string;
  entryType: MealPlanEntryType;
  recipeId?: string;
  title?: string;
}

export interface ShoppingListItem {
  id: string;
  shoppingListId: string;
  note?: string | null;
  quantity?: number | null;
  checked: boolean;
  display?: string | null;
  position?: number;
  unit?: NamedRef | null;
  food?: NamedRef | null;
}

export interface ShoppingListItemInput {
  note: string;
  quantity: number;
  checked: boolean;
}

/** Item writes answer with the items the backend created, merged or removed. */
export interface ShoppingListItemsCollection {
  createdItems?: ShoppingListItem[];
  updatedItems?: ShoppingListItem[];
  deletedItems?: ShoppingListItem[];
}

export interface ShoppingListSummary {
  id: string;
  name: string;
}

export interface ShoppingList extends ShoppingListSummary {
  listItems?: ShoppingListItem[];
}

export interface IngredientParseResult {
  input?: string;
  ingredient: RecipeIngredient;
}
