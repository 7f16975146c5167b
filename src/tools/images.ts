import { z } from "zod";
import { defineTool } from "./types.js";

const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp"];
const FALLBACK_FILENAME = "recipe_image.png";

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$|^[A-Za-z0-9_-]+={0,2}$/;

/** Standard or URL-safe alphabet; whitespace is ignored. */
export function isBase64(value: string): boolean {
  const compact = value.replace(/\s+/g, "");
  return compact.length % 4 !== 1 && BASE64.test(compact);
}

function lastSegment(url: string): string {
  const segment = new URL(url).pathname.split("/").pop() ?? "";
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes; the fallback name applies.
    return "";
  }
}

/** Last path segment of the URL, decoded, if it looks like an image file. */
export function filenameFromUrl(url: string): string {
  const name = lastSegment(url);
  const lower = name.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lower.endsWith(extension)) ? name : FALLBACK_FILENAME;
}

const UploadedShape = z.object({ slug: z.string(), filename: z.string() });

export const uploadRecipeImage = defineTool({
  name: "upload_recipe_image",
  description: "Download an image from a URL and set it as a recipe's image.",
  input: z.object({
    slug: z.string().min(1).describe("Slug of the recipe."),
    image_url: z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL")
      .describe("URL of the image to download."),
  }),
  output: UploadedShape,
  async execute(args, { client, signal }) {
    const image = await client.downloadImage(args.image_url, signal);
    const filename = filenameFromUrl(args.image_url);
    await client.uploadRecipeImage(args.slug, image, filename, signal);
    console.error(`[Info] Uploaded ${filename} (${image.byteLength} bytes) to recipe ${args.slug}`);
    return { slug: args.slug, filename };
  },
});

export const uploadRecipeImageBase64 = defineTool({
  name: "upload_recipe_image_base64",
  description: "Set a recipe's image from base64-encoded image data.",
  input: z.object({
    slug: z.string().min(1).describe("Slug of the recipe."),
    image_base64: z
      .string()
      .min(1)
      .refine((value) => isBase64(value), "must be base64-encoded image data")
      .describe("Base64-encoded image data."),
    filename: z.string().min(1).default("recipe.png").describe("Filename for the image (default recipe.png)."),
  }),
  output: UploadedShape,
  async execute(args, { client, signal }) {
    const image = new Uint8Array(Buffer.from(args.image_base64, "base64"));
    await client.uploadRecipeImage(args.slug, image, args.filename, signal);
    return { slug: args.slug, filename: args.filename };
  },
});
