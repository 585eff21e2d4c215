import path from "path";
import { z } from "zod";
import { parseExtractTypes } from "./extract-types";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const envSchema = z.object({
  CONFIG_DIR: z.string().min(1).default(path.resolve(__dirname, "..", "..", "config")),
  EXTRACT_DIR: z.string().min(1).default(path.resolve(process.cwd(), "extracts")),
  DATABASE_URL: z.string().url().optional(),
  RUN_DATE: isoDate.optional(),
  RUN_DATE_RANGE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}:\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD:YYYY-MM-DD")
    .optional(),
  RUN_EXTRACT_TYPES: z
    .string()
    .default("portfolio,profitability,statement")
    .transform((value, ctx) => {
      try {
        const types = parseExtractTypes(value);
        if (types.length === 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "No extract types selected" });
          return z.NEVER;
        }
        return types;
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : "Invalid extract types"
        });
        return z.NEVER;
      }
    }),
  INSERT_BATCH_SIZE: z.coerce.number().int().positive().max(10_000).default(500),
  INSERT_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  INSERT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MISSING_FUNDS_DISPLAY_LIMIT: z.coerce.number().int().positive().default(10),
  NOTIFY_RECIPIENTS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    )
});

export type WorkerEnv = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
