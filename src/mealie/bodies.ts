import { z } from "zod";
import type { RawPage } from "./pagination.js";

// --- Response Body Checks ---
// The client checks only the outer structure of what Mealie sends back. Field
// types inside are checked by each tool's output schema.

export type BodyCheck<T> = (data: unknown) => data is T;

const ObjectSchema = z.record(z.unknown());
const ListSchema = z.array(z.unknown());
const Count = z.number().optional();

const EnvelopeSchema = z
  .object({
    items: ListSchema.optional(),
    results: ListSchema.optional(),
    page: Count,
    per_page: Count,
    perPage: Count,
    total: Count,
    count: Count,
    total_pages: Count,
    totalPages: Count,
    offset: Count,
    limit: Count,
  })
  .refine((body) => body.items !== undefined || body.results !== undefined);

const ItemsCollectionSchema = z.object({
  createdItems: ListSchema.optional(),
  updatedItems: ListSchema.optional(),
  deletedItems: ListSchema.optional(),
});

const ParseResultSchema = z.object({ ingredient: ObjectSchema });

const SlugSchema = z.string().min(1);

function conforms<T>(schema: z.ZodTypeAny): BodyCheck<T> {
  return (data: unknown): data is T => schema.safeParse(data).success;
}

/** Bodies nothing reads, such as delete acknowledgements. */
export const anyBody: BodyCheck<unknown> = (_data: unknown): _data is unknown => true;

export const objectBody = <T extends object>() => conforms<T>(ObjectSchema);

export const listBody = <T>() => conforms<T[]>(ListSchema);

/** A bare array or an envelope carrying `items` or `results`. */
export const pageBody = <T>() => conforms<RawPage<T>>(z.union([ListSchema, EnvelopeSchema]));

export const itemsCollectionBody = <T extends object>() => conforms<T>(ItemsCollectionSchema);

export const parseResultBody = <T extends object>() => conforms<T>(ParseResultSchema);

export const slugBody: BodyCheck<string> = conforms<string>(SlugSchema);
