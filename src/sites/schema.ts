import { z } from "zod";

const fetchModeSchema = z.enum(["static", "dynamic"]);

const selectorListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : [value]).map((item) => item.trim()).filter(Boolean));

const regexSourceSchema = z.string().refine(
  (value) => {
    try {
      new RegExp(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" },
);

export const siteRuleSchema = z
  .object({
    searchUrl: z
      .string()
      .min(1)
      .refine((value) => value.includes("{query}"), { message: "searchUrl must contain a {query} placeholder" })
      .optional(),
    queryEncoding: z.enum(["none", "single", "double"]).optional(),
    fetchMode: fetchModeSchema.optional(),
    selectors: z
      .object({
        item: z.string().min(1),
        title: z.string().min(1),
        date: z.string().min(1),
        waitFor: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    dateFromItem: z.boolean().optional(),
    matchKeyword: z.boolean().optional(),
    matchInTitleOnly: z.boolean().optional(),
    linkHrefContains: z.string().min(1).optional(),
    detail: z
      .object({
        enabled: z.boolean(),
        fetchMode: fetchModeSchema,
        titleSelectors: selectorListSchema,
        attachmentSelectors: selectorListSchema,
        attachmentExtensions: z.array(z.string()),
        attachmentTextKeywords: z.array(z.string()),
        snapshot: z
          .object({
            enabled: z.boolean(),
            markdown: z.boolean(),
            titleSelectors: selectorListSchema,
            dateSelectors: selectorListSchema,
            bodySelectors: selectorListSchema,
            removeSelectors: selectorListSchema,
            fallbackToOriginal: z.boolean(),
          })
          .partial()
          .strict(),
      })
      .partial()
      .strict()
      .optional(),
    detailDate: z
      .object({
        enabled: z.boolean(),
        fetchMode: fetchModeSchema,
        selectors: selectorListSchema,
        patterns: z.array(regexSourceSchema),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

export type SiteRuleInput = z.output<typeof siteRuleSchema>;
