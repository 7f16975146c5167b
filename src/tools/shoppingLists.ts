import { z } from "zod";
import { defineTool } from "./types.js";
import { deletedShape, PageArgs, pageFields, pageMeta, ShoppingListItemShape, toShoppingListItem } from "./shapes.js";

const ListId = z.string().min(1).describe("ID of the shopping list.");
const ItemId = z.string().min(1).describe("ID of the shopping list item.");

export const getShoppingLists = defineTool({
  name: "get_shopping_lists",
  description: "List the household's shopping lists.",
  input: z.object({ ...PageArgs }),
  output: z.object({
    items: z.array(z.object({ id: z.string(), name: z.string() })),
    ...pageFields,
  }),
  async execute(args, { client, signal }) {
    const result = await client.getShoppingLists({ page: args.page, pageSize: args.page_size }, signal);
    return {
      items: result.items.map((list) => ({ id: list.id, name: list.name })),
      ...pageMeta(result),
    };
  },
});

export const getShoppingList = defineTool({
  name: "get_shopping_list",
  description: "Get a shopping list and all of its items.",
  input: z.object({ list_id: ListId }),
  output: z.object({
    id: z.string(),
    name: z.string(),
    items: z.array(ShoppingListItemShape),
  }),
  async execute(args, { client, signal }) {
    const list = await client.getShoppingList(args.list_id, signal);
    return {
      id: list.id,
      name: list.name,
      items: (list.listItems ?? []).map(toShoppingListItem),
    };
  },
});

export const createShoppingListItem = defineTool({
  name: "create_shopping_list_item",
  description: "Add an item to a shopping list.",
  input: z.object({
    list_id: ListId,
    note: z.string().min(1).describe("What to buy, e.g. '2 lemons'."),
    quantity: z.number().positive().default(1).describe("Quantity (default 1)."),
  }),
  output: ShoppingListItemShape,
  async execute(args, { client, signal }) {
    const item = await client.createShoppingListItem(
      args.list_id,
      { note: args.note, quantity: args.quantity, checked: false },
      signal,
    );
    console.error(`[Info] Added item ${item.id} to shopping list ${args.list_id}`);
    return toShoppingListItem(item);
  },
});

export const updateShoppingListItem = defineTool({
  name: "update_shopping_list_item",
  description: "Update a shopping list item, e.g. check it off or change its note or quantity.",
  input: z
    .object({
      item_id: ItemId,
      note: z.string().min(1).optional().describe("New note."),
      quantity: z.number().positive().optional().describe("New quantity."),
      checked: z.boolean().optional().describe("New checked status."),
    })
    .refine((args) => args.note !== undefined || args.quantity !== undefined || args.checked !== undefined, {
      message: "Provide at least one of note, quantity or checked",
    }),
  output: ShoppingListItemShape,
  async execute(args, { client, signal }) {
    // The backend replaces the whole item, so start from its current state.
    const current = await client.getShoppingListItem(args.item_id, signal);
    const updated = await client.updateShoppingListItem(
      args.item_id,
      {
        ...current,
        note: args.note ?? current.note,
        quantity: args.quantity ?? current.quantity,
        checked: args.checked ?? current.checked,
      },
      signal,
    );
    return toShoppingListItem(updated);
  },
});

export const deleteShoppingListItem = defineTool({
  name: "delete_shopping_list_item",
  description: "Remove an item from a shopping list.",
  input: z.object({ item_id: ItemId }),
  output: deletedShape(z.string()),
  async execute(args, { client, signal }) {
    await client.deleteShoppingListItem(args.item_id, signal);
    return { id: args.item_id, deleted: true as const };
  },
});
