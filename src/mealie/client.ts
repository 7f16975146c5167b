import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { BackendCredentials } from "../config.js";
import { DEFAULT_TIMEOUT_MS } from "../config.js";
import {
  AuthError,
  ConfigurationError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UpstreamError,
  UpstreamShapeError,
} from "../errors.js";
import {
  anyBody,
  type BodyCheck,
  itemsCollectionBody,
  listBody,
  objectBody,
  pageBody,
  parseResultBody,
  slugBody,
} from "./bodies.js";
import { normalizePage, type Page, type PageRequest } from "./pagination.js";
import type {
  IngredientParseResult,
  MealPlanEntry,
  MealPlanInput,
  Recipe,
  RecipeIngredient,
  RecipePatch,
  RecipeSummary,
  ShoppingList,
  ShoppingListItem,
  ShoppingListItemInput,
  ShoppingListItemsCollection,
  ShoppingListSummary,
} from "./types.js";

type Method = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

interface CallOptions {
  params?: Record<string, unknown>;
  data?: unknown;
  signal?: AbortSignal;
}

export interface MealieClientOptions {
  credentials: BackendCredentials;
  timeoutMs?: number;
  /** Tests hand in an instance with an in-process adapter. */
  http?: AxiosInstance;
}

export interface RecipeSearch extends PageRequest {
  search?: string;
  categories?: string[];
  tags?: string[];
}

export interface MealPlanQuery extends PageRequest {
  startDate: string;
  endDate: string;
}

/** Seconds to wait, from either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return Math.max(0, value);
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === "") return "";
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return text.length > 500 ? `${text.slice(0, 500)}...` : text;
}

function errorForResponse(response: AxiosResponse<unknown>, label: string): Error {
  const { status } = response;
  const detail = describeBody(response.data);
  const message = `${label} failed with ${status}${detail ? `: ${detail}` : ""}`;
  if (status === 401 || status === 403) return new AuthError(message);
  if (status === 404) return new NotFoundError(message);
  if (status === 429) return new RateLimitedError(message, parseRetryAfter(response.headers["retry-after"]));
  return new UpstreamError(message, status);
}

function pickItem(collection: ShoppingListItemsCollection, label: string, prefer: "created" | "updated"): ShoppingListItem {
  const created = collection.createdItems ?? [];
  const updated = collection.updatedItems ?? [];
  // Mealie may merge a new item into an existing one and report it as updated.
  const item = prefer === "created" ? (created[0] ?? updated[0]) : (updated[0] ?? created[0]);
  if (!item) throw new UpstreamShapeError(`${label} returned no shopping list item`);
  return item;
}

/**
 * Typed client for the Mealie REST API.
 *
 * No retries and no caching: every failure surfaces once, as a domain error.
 */
export class MealieClient {
  private readonly credentials: BackendCredentials;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: MealieClientOptions) {
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = options.http ?? axios.create();
  }

  private requireCredentials(): { baseUrl: string; apiToken: string } {
    const { baseUrl, apiToken } = this.credentials;
    const missing: string[] = [];
    if (!baseUrl) missing.push("MEALIE_URL");
    if (!apiToken) missing.push("MEALIE_API_TOKEN");
    if (!baseUrl || !apiToken) {
      throw new ConfigurationError(`Mealie is not configured: set ${missing.join(" and ")}.`);
    }
    return { baseUrl: baseUrl.replace(/\/+$/, ""), apiToken };
  }

  private async send<T>(config: AxiosRequestConfig, label: string, signal?: AbortSignal): Promise<AxiosResponse<T>> {
    const deadline = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, deadline]) : deadline;

    let response: AxiosResponse<T>;
    try {
      response = await this.http.request<T>({
        ...config,
        signal: combined,
        // Status mapping happens below, not in axios.
        validateStatus: () => true,
        paramsSerializer: { indexes: null },
      });
    } catch (error) {
      if (signal?.aborted) throw new TransportError(`${label} was cancelled`, { cause: error });
      if (deadline.aborted) {
        throw new TransportError(`${label} timed out after ${this.timeoutMs} ms`, { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${label} failed: ${reason}`, { cause: error });
    }

    console.error(`[API] ${label} - Status: ${response.status}`);
    if (response.status >= 400) throw errorForResponse(response, label);
    return response;
  }

  private async call<T>(method: Method, path: string, check: BodyCheck<T>, options: CallOptions = {}): Promise<T> {
    const { baseUrl, apiToken } = this.requireCredentials();
    const label = `${method} ${path}`;
    console.error(`[API] ${label}`);
    const response = await this.send<unknown>(
      {
        method,
        url: `${baseUrl}${path}`,
        params: options.params,
        data: options.data,
        headers: {
          Authorization: `Bearer ${apiToken}`,
          Accept: "application/json",
        },
      },
      label,
      options.signal,
    );
    const data = response.data;
    if (!check(data)) {
      throw new UpstreamShapeError(`${label} returned an unexpected body: ${describeBody(data) || "nothing"}`);
    }
    return data;
  }

  // --- Recipes ---

  async searchRecipes(query: RecipeSearch, signal?: AbortSignal): Promise<Page<RecipeSummary>> {
    const raw = await this.call("GET", "/api/recipes", pageBody<RecipeSummary>(), {
      params: {
        page: query.page,
        perPage: query.pageSize,
        search: query.search,
        categories: query.categories,
        tags: query.tags,
      },
      signal,
    });
    return normalizePage(raw, query);
  }

  async getRecipe(slug: string, signal?: AbortSignal): Promise<Recipe> {
    return this.call("GET", `/api/recipes/${encodeURIComponent(slug)}`, objectBody<Recipe>(), { signal });
  }

  /** Creates an empty recipe and returns its slug. */
  async createRecipe(name: string, signal?: AbortSignal): Promise<string> {
    return this.call("POST", "/api/recipes", slugBody, { data: { name }, signal });
  }

  async updateRecipe(slug: string, patch: RecipePatch, signal?: AbortSignal): Promise<Recipe> {
    return this.call("PATCH", `/api/recipes/${encodeURIComponent(slug)}`, objectBody<Recipe>(), { data: patch, signal });
  }

  async deleteRecipe(slug: string, signal?: AbortSignal): Promise<void> {
    await this.call("DELETE", `/api/recipes/${encodeURIComponent(slug)}`, anyBody, { signal });
  }

  async uploadRecipeImage(slug: string, image: Uint8Array, filename: string, signal?: AbortSignal): Promise<void> {
    const dot = filename.lastIndexOf(".");
    const extension = dot >= 0 ? filename.slice(dot + 1).toLowerCase() : "png";
    const form = new FormData();
    form.append("image", new Blob([new Uint8Array(image)]), filename);
    form.append("extension", extension);
    await this.call("PUT", `/api/recipes/${encodeURIComponent(slug)}/image`, anyBody, { data: form, signal });
  }

  // --- Meal Plans ---

  async getMealPlans(query: MealPlanQuery, signal?: AbortSignal): Promise<Page<MealPlanEntry>> {
    const raw = await this.call("GET", "/api/households/mealplans", pageBody<MealPlanEntry>(), {
      params: {
        start_date: query.startDate,
        end_date: query.endDate,
        page: query.page,
        perPage: query.pageSize,
      },
      signal,
    });
    return normalizePage(raw, query);
  }

  async getTodaysMeals(signal?: AbortSignal): Promise<MealPlanEntry[]> {
    return this.call("GET", "/api/households/mealplans/today", listBody<MealPlanEntry>(), { signal });
  }

  async createMealPlan(entry: MealPlanInput, signal?: AbortSignal): Promise<MealPlanEntry> {
    return this.call("POST", "/api/households/mealplans", objectBody<MealPlanEntry>(), { data: entry, signal });
  }

  async deleteMealPlan(id: number, signal?: AbortSignal): Promise<void> {
    await this.call("DELETE", `/api/households/mealplans/${id}`, anyBody, { signal });
  }

  // --- Shopping Lists ---

  async getShoppingLists(query: PageRequest, signal?: AbortSignal): Promise<Page<ShoppingListSummary>> {
    const raw = await this.call("GET", "/api/households/shopping/lists", pageBody<ShoppingListSummary>(), {
      params: { page: query.page, perPage: query.pageSize },
      signal,
    });
    return normalizePage(raw, query);
  }

  async getShoppingList(listId: string, signal?: AbortSignal): Promise<ShoppingList> {
    const path = `/api/households/shopping/lists/${encodeURIComponent(listId)}`;
    return this.call("GET", path, objectBody<ShoppingList>(), { signal });
  }

  async createShoppingListItem(listId: string, item: ShoppingListItemInput, signal?: AbortSignal): Promise<ShoppingListItem> {
    const path = "/api/households/shopping/items";
    const collection = await this.call("POST", path, itemsCollectionBody<ShoppingListItemsCollection>(), {
      data: { shoppingListId: listId, ...item },
      signal,
    });
    return pickItem(collection, `POST ${path}`, "created");
  }

  async getShoppingListItem(itemId: string, signal?: AbortSignal): Promise<ShoppingListItem> {
    const path = `/api/households/shopping/items/${encodeURIComponent(itemId)}`;
    return this.call("GET", path, objectBody<ShoppingListItem>(), { signal });
  }

  async updateShoppingListItem(itemId: string, item: ShoppingListItem, signal?: AbortSignal): Promise<ShoppingListItem> {
    const path = `/api/households/shopping/items/${encodeURIComponent(itemId)}`;
    const collection = await this.call("PUT", path, itemsCollectionBody<ShoppingListItemsCollection>(), {
      data: item,
      signal,
    });
    return pickItem(collection, `PUT ${path}`, "updated");
  }

  async deleteShoppingListItem(itemId: string, signal?: AbortSignal): Promise<void> {
    await this.call("DELETE", `/api/households/shopping/items/${encodeURIComponent(itemId)}`, anyBody, { signal });
  }

  // --- Misc ---

  async parseIngredient(text: string, signal?: AbortSignal): Promise<RecipeIngredient> {
    const result = await this.call("POST", "/api/parser/ingredient", parseResultBody<IngredientParseResult>(), {
      data: { parser: "nlp", ingredient: text },
      signal,
    });
    return result.ingredient;
  }

  /** Fetches an arbitrary image URL. No Mealie credentials are sent. */
  async downloadImage(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    this.requireCredentials();
    const label = `GET ${url}`;
    console.error(`[API] ${label}`);
    const response = await this.send<ArrayBuffer>({ method: "GET", url, responseType: "arraybuffer" }, label, signal);
    return new Uint8Array(response.data);
  }
}
