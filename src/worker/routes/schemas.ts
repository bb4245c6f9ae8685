// Request body schemas shared by the crawl and search routes

import { z } from "zod/v4";

export const SeedUrlSchema = z
  .string()
  .trim()
  .refine(value => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, { message: "must be an absolute http(s) URL" });

/** A seed field where a blank string counts as not given */
const OptionalSeedUrlSchema = z
  .string()
  .trim()
  .transform(value => value || undefined)
  .pipe(SeedUrlSchema.optional())
  .optional();

export const CrawlBodySchema = z
  .object({
    url: OptionalSeedUrlSchema,
    url2: OptionalSeedUrlSchema,
  })
  .refine(body => Boolean(body.url || body.url2), {
    message: "url or url2 is required",
    path: ["url"],
  });

export const SearchBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  url: OptionalSeedUrlSchema,
  url2: OptionalSeedUrlSchema,
  smart: z.boolean().optional(),
});
