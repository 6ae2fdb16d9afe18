import { z } from "zod";

export const DEFAULT_MIN_YEAR = 1833;
export const DEFAULT_MAX_YEAR = 1913;
export const DEFAULT_CONCURRENCY = 8;

/**
 * Options for one corpus run.
 */
export const CorpusOptionsSchema = z
  .object({
    dataDir: z.string().min(1, "A data directory is required"),
    minYear: z.number().int().default(DEFAULT_MIN_YEAR),
    maxYear: z.number().int().default(DEFAULT_MAX_YEAR),
    concurrency: z.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
    occupationCsv: z.string().min(1).optional(),
  })
  .refine((options) => options.maxYear >= options.minYear, {
    message: "maxYear must not be before minYear",
    path: ["maxYear"],
  });

export type CorpusOptionsInput = z.input<typeof CorpusOptionsSchema>;
export type CorpusOptions = z.output<typeof CorpusOptionsSchema>;

export function resolveCorpusOptions(input: CorpusOptionsInput): CorpusOptions {
  return CorpusOptionsSchema.parse(input);
}
