import { describe, it, expect } from "vitest";
import { z } from "zod";
import { DuplicateToolError, UnknownToolError, type ValidationError } from "../errors.js";
import { buildToolRegistry } from "../tools/index.js";
import { ToolRegistry } from "../tools/registry.js";
import { defineTool } from "../tools/types.js";

/** One well-formed argument set per registered tool. */
const VALID_ARGS: Record<string, Record<string, unknown>> = {
  get_todays_date: {},
  get_date_offset: { days_from_today: 3 },
  search_recipes: { query: "pasta", categories: "dinner, italian", page: 1, page_size: 10 },
  get_recipe: { slug: "lasagna" },
  create_recipe: {
    name: "Lemon Soup",
    description: "Bright and quick",
    ingredients: [{ note: "2 lemons" }, { note: "1 l stock", quantity: 1, unit: "l" }],
    instructions: [{ text: "Simmer." }],
    servings: "4 servings",
  },
  update_recipe: { slug: "lemon-soup", prep_time: "10 minutes" },
  delete_recipe: { slug: "lemon-soup" },
  parse_ingredient: { text: "2 tbsp olive oil" },
  upload_recipe_image: { slug: "lasagna", image_url: "https://images.test/lasagna.jpg" },
  upload_recipe_image_base64: { slug: "lasagna", image_base64: "aGVsbG8=" },
  get_todays_meals: {},
  get_meal_plans: { start_date: "2026-10-19", end_date: "2026-10-26" },
  create_meal_plan: { date: "2026-10-20", entry_type: "dinner", recipe_slug: "lasagna" },
  delete_meal_plan: { item_id: 12 },
  get_shopping_lists: {},
  get_shopping_list: { list_id: "list-1" },
  create_shopping_list_item: { list_id: "list-1", note: "2 lemons" },
  update_shopping_list_item: { item_id: "item-1", checked: true },
  delete_shopping_list_item: { item_id: "item-1" },
};

const echo = defineTool({
  name: "echo",
  description: "Echo the text back.",
  input: z.object({ text: z.string() }),
  output: z.object({ text: z.string() }),
  async execute(args) {
    return { text: args.text };
  },
});

describe("ToolRegistry", () => {
  it("rejects a second tool with the same name", () => {
    const registry = new ToolRegistry();
    registry.register(echo);

    expect(() => registry.register(echo)).toThrow(DuplicateToolError);
  });

  it("fails lookup of an unknown tool with its name as the message", () => {
    const registry = buildToolRegistry();

    expect(() => registry.lookup("delete_universe")).toThrow(new UnknownToolError("delete_universe"));
  });

  it("registers every tool once", () => {
    const names = buildToolRegistry().names();

    expect(new Set(names).size).toBe(names.length);
    expect(names.sort()).toEqual(Object.keys(VALID_ARGS).sort());
  });

  it("accepts well-formed arguments for every registered tool", () => {
    const registry = buildToolRegistry();

    for (const name of registry.names()) {
      const validation = registry.validate(registry.lookup(name), VALID_ARGS[name]);
      expect(validation.ok, name).toBe(true);
    }
  });

  describe("validate", () => {
    const registry = buildToolRegistry();

    function errorFor(name: string, args: unknown): ValidationError | undefined {
      const validation = registry.validate(registry.lookup(name), args);
      return validation.ok ? undefined : validation.error;
    }

    it("names a missing required field", () => {
      expect(errorFor("get_recipe", {})).toMatchObject({ field: "slug", reason: "Required" });
    });

    it("treats absent arguments as an empty object", () => {
      expect(errorFor("get_recipe", undefined)).toMatchObject({ field: "slug", reason: "Required" });
      expect(errorFor("get_todays_date", undefined)).toBeUndefined();
    });

    it("reports the first offending field in declaration order", () => {
      expect(errorFor("create_shopping_list_item", { note: 5 })).toMatchObject({ field: "list_id", reason: "Required" });
      expect(errorFor("create_shopping_list_item", { list_id: "list-1", note: 5 })).toMatchObject({
        field: "note",
        reason: "Expected string, received number",
      });
    });

    it("uses dotted paths for nested fields", () => {
      const error = errorFor("create_recipe", {
        name: "Soup",
        ingredients: [{ note: "salt" }, {}],
        instructions: [{ text: "Stir." }],
      });
      expect(error).toMatchObject({ field: "ingredients.1.note", reason: "Required" });
    });

    it("enforces value ranges", () => {
      expect(errorFor("search_recipes", { page_size: 500 })).toMatchObject({
        field: "page_size",
        reason: "Number must be less than or equal to 100",
      });
      expect(errorFor("search_recipes", { page: 0 })).toMatchObject({
        field: "page",
        reason: "Number must be greater than or equal to 1",
      });
      expect(errorFor("delete_meal_plan", { item_id: 1.5 })).toMatchObject({
        field: "item_id",
        reason: "Expected integer, received float",
      });
    });

    it("rejects values outside an enum", () => {
      expect(errorFor("create_meal_plan", { date: "2026-10-20", entry_type: "brunch", title: "Pancakes" })).toMatchObject({
        field: "entry_type",
      });
    });

    it("checks date formats", () => {
      expect(errorFor("get_meal_plans", { start_date: "19/10/2026" })).toMatchObject({
        field: "start_date",
        reason: "Use YYYY-MM-DD",
      });
    });

    it("reports cross-field rules", () => {
      expect(errorFor("update_recipe", { slug: "soup" })).toMatchObject({
        field: "arguments",
        reason: "Provide at least one field to update",
      });
      expect(errorFor("create_meal_plan", { date: "2026-10-20", entry_type: "lunch" })).toMatchObject({
        field: "recipe_slug",
        reason: "Provide recipe_slug or title",
      });
    });

    it("formats the message as field and reason", () => {
      expect(errorFor("get_recipe", { slug: 3 })?.message).toBe("slug: Expected string, received number");
    });
  });

  describe("list", () => {
    const tools = buildToolRegistry().list();
    const byName = (name: string) => tools.find((tool) => tool.name === name);

    it("describes every tool with object schemas", () => {
      for (const tool of tools) {
        expect(tool.inputSchema.type).toBe("object");
        expect(tool.outputSchema?.type).toBe("object");
        expect(tool.description).toBeTruthy();
      }
    });

    it("publishes required fields", () => {
      expect(byName("get_recipe")?.inputSchema.required).toEqual(["slug"]);
      expect(byName("create_shopping_list_item")?.inputSchema.required).toEqual(["list_id", "note"]);
    });

    it("publishes defaults and ranges", () => {
      expect(byName("search_recipes")?.inputSchema.properties?.page_size).toMatchObject({
        type: "integer",
        minimum: 1,
        maximum: 100,
        default: 20,
      });
    });

    it("does not leak the JSON Schema dialect marker", () => {
      expect(byName("get_recipe")?.inputSchema).not.toHaveProperty("$schema");
    });
  });
});
