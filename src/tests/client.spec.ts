import { describe, it, expect } from "vitest";
import {
  AuthError,
  ConfigurationError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UpstreamError,
  UpstreamShapeError,
} from "../errors.js";
import { MealieClient, parseRetryAfter } from "../mealie/client.js";
import { BASE_URL, FakeMealie, TOKEN } from "./fakeMealie.js";

function setup(options: { baseUrl?: string; apiToken?: string; timeoutMs?: number } = {}) {
  const { timeoutMs, ...overrides } = options;
  const fake = new FakeMealie();
  const client = new MealieClient({
    credentials: { baseUrl: BASE_URL, apiToken: TOKEN, ...overrides },
    timeoutMs,
    http: fake.http(),
  });
  return { fake, client };
}

describe("MealieClient", () => {
  describe("requests", () => {
    it("sends the bearer token and resolves paths against a trimmed base URL", async () => {
      const { fake, client } = setup({ baseUrl: `${BASE_URL}/` });
      fake.addRecipe("Lasagna");

      const recipe = await client.getRecipe("lasagna");

      expect(recipe.name).toBe("Lasagna");
      expect(fake.requests).toHaveLength(1);
      expect(fake.requests[0]).toMatchObject({
        method: "GET",
        path: "/api/recipes/lasagna",
        authorization: `Bearer ${TOKEN}`,
      });
    });

    it("sends search filters as page/perPage query parameters", async () => {
      const { fake, client } = setup();

      await client.searchRecipes({ search: "pasta", categories: ["dinner", "italian"], page: 2, pageSize: 10 });

      expect(fake.requests[0]?.params).toEqual({
        page: 2,
        perPage: 10,
        search: "pasta",
        categories: ["dinner", "italian"],
      });
    });

    it("normalises paginated answers", async () => {
      const { fake, client } = setup();
      for (let i = 1; i <= 12; i++) fake.addRecipe(`Soup ${i}`);

      const page = await client.searchRecipes({ page: 2, pageSize: 5 });

      expect(page.page).toBe(2);
      expect(page.totalPages).toBe(3);
      expect(page.total).toBe(12);
      expect(page.items.map((recipe) => recipe.name)).toEqual(["Soup 6", "Soup 7", "Soup 8", "Soup 9", "Soup 10"]);
    });
  });

  describe("configuration", () => {
    it("fails with ConfigurationError before any I/O when both values are missing", async () => {
      const { fake, client } = setup({ baseUrl: undefined, apiToken: undefined });

      await expect(client.getRecipe("lasagna")).rejects.toThrow(
        new ConfigurationError("Mealie is not configured: set MEALIE_URL and MEALIE_API_TOKEN."),
      );
      expect(fake.requests).toHaveLength(0);
    });

    it("names the missing token", async () => {
      const { fake, client } = setup({ apiToken: undefined });

      await expect(client.getShoppingLists({ page: 1, pageSize: 10 })).rejects.toThrow(
        "Mealie is not configured: set MEALIE_API_TOKEN.",
      );
      expect(fake.requests).toHaveLength(0);
    });

    it("does not download images without configuration", async () => {
      const { fake, client } = setup({ baseUrl: undefined });

      await expect(client.downloadImage("https://images.test/a.png")).rejects.toBeInstanceOf(ConfigurationError);
      expect(fake.requests).toHaveLength(0);
    });
  });

  describe("error mapping", () => {
    it.each([
      [401, AuthError],
      [403, AuthError],
      [404, NotFoundError],
      [429, RateLimitedError],
      [500, UpstreamError],
      [503, UpstreamError],
      [400, UpstreamError],
    ])("maps %i to %o", async (status, errorClass) => {
      const { fake, client } = setup();
      fake.reply = { status, body: { detail: "nope" } };

      await expect(client.getRecipe("anything")).rejects.toBeInstanceOf(errorClass);
    });

    it("includes the request and body in the message", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 500, body: { detail: "boom" } };

      await expect(client.getRecipe("lasagna")).rejects.toThrow(
        'GET /api/recipes/lasagna failed with 500: {"detail":"boom"}',
      );
    });

    it("keeps the status on UpstreamError", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 422, body: "bad entry type" };

      const error = await client.createMealPlan({ date: "2026-10-19", entryType: "dinner" }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ status: 422, message: "POST /api/households/mealplans failed with 422: bad entry type" });
    });

    it("carries Retry-After on RateLimitedError", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 429, headers: { "retry-after": "7" } };

      const error = await client.getRecipe("lasagna").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfter: 7 });
    });

    it("sends a rejected request exactly once", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 401, body: { detail: "Not authenticated" } };

      await expect(client.getRecipe("lasagna")).rejects.toBeInstanceOf(AuthError);
      expect(fake.requests).toHaveLength(1);
    });
  });

  describe("transport failures", () => {
    it("maps a network error to TransportError", async () => {
      const { fake, client } = setup();
      fake.networkError = "connect ECONNREFUSED 127.0.0.1:9000";

      await expect(client.getRecipe("lasagna")).rejects.toThrow(
        new TransportError("GET /api/recipes/lasagna failed: connect ECONNREFUSED 127.0.0.1:9000"),
      );
    });

    it("gives up after the per-call timeout", async () => {
      const { fake, client } = setup({ timeoutMs: 20 });
      fake.hang = true;

      await expect(client.getRecipe("slow")).rejects.toThrow(
        new TransportError("GET /api/recipes/slow timed out after 20 ms"),
      );
    });

    it("abandons the call when the caller's signal fires", async () => {
      const { fake, client } = setup({ timeoutMs: 5_000 });
      fake.hang = true;
      const controller = new AbortController();

      const pending = client.getRecipe("slow", controller.signal);
      controller.abort();

      await expect(pending).rejects.toThrow(new TransportError("GET /api/recipes/slow was cancelled"));
    });
  });

  describe("responses with unexpected shapes", () => {
    it("rejects a recipe creation that returns no slug", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 201, body: { id: "recipe-1" } };

      await expect(client.createRecipe("Soup")).rejects.toBeInstanceOf(UpstreamShapeError);
    });

    it("rejects a search answered with an HTML page", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: "<html>Mealie</html>" };

      await expect(client.searchRecipes({ page: 1, pageSize: 10 })).rejects.toThrow(
        new UpstreamShapeError("GET /api/recipes returned an unexpected body: <html>Mealie</html>"),
      );
    });

    it("rejects a page envelope without items", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: { total: 3 } };

      await expect(client.getShoppingLists({ page: 1, pageSize: 10 })).rejects.toBeInstanceOf(UpstreamShapeError);
    });

    it("rejects today's meals that are not a list", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: { detail: "x" } };

      await expect(client.getTodaysMeals()).rejects.toThrow(
        new UpstreamShapeError('GET /api/households/mealplans/today returned an unexpected body: {"detail":"x"}'),
      );
    });

    it("rejects a parser answer without an ingredient", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: {} };

      await expect(client.parseIngredient("2 eggs")).rejects.toThrow(
        new UpstreamShapeError("POST /api/parser/ingredient returned an unexpected body: {}"),
      );
    });

    it("rejects a recipe answered with a string", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: "OK" };

      await expect(client.getRecipe("lasagna")).rejects.toThrow(
        new UpstreamShapeError("GET /api/recipes/lasagna returned an unexpected body: OK"),
      );
    });

    it("accepts any body on delete", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 204 };

      await expect(client.deleteRecipe("lasagna")).resolves.toBeUndefined();
    });

    it("takes a merged item when the backend reports it as updated", async () => {
      const { fake, client } = setup();
      const merged = { id: "item-9", shoppingListId: "list-1", note: "2 lemons", quantity: 2, checked: false };
      fake.reply = { status: 200, body: { createdItems: [], updatedItems: [merged] } };

      const item = await client.createShoppingListItem("list-1", { note: "lemon", quantity: 1, checked: false });

      expect(item).toEqual(merged);
    });

    it("rejects an item write that returns no items", async () => {
      const { fake, client } = setup();
      fake.reply = { status: 200, body: { createdItems: [], updatedItems: [] } };

      await expect(
        client.createShoppingListItem("list-1", { note: "lemon", quantity: 1, checked: false }),
      ).rejects.toThrow(new UpstreamShapeError("POST /api/households/shopping/items returned no shopping list item"));
    });
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("120")).toBe(120);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:27:30 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:00 GMT", now)).toBe(30);
  });

  it("never returns a negative wait", () => {
    const now = Date.parse("Wed, 21 Oct 2026 08:00:00 GMT");
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:00 GMT", now)).toBe(0);
  });

  it("ignores missing or garbled values", () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});
