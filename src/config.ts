import "dotenv/config";
import { z } from "zod";
import { uniqueStrings } from "./utils/collections.js";

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
  });

const envSchema = z.object({
  HI_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.9),
  LO_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.7),
  PROBLEMATIC_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.35),
  PROBLEMATIC_SUBCATEGORIES: z
    .string()
    .default("")
    .transform((value) => uniqueStrings(value.split(","))),
  CONTAINS_FIELDS: z
    .string()
    .default("name,address")
    .transform((value) => uniqueStrings(value.split(",")).map((field) => field.toLowerCase()))
    .pipe(z.array(z.enum(["name", "address"])).min(1)),
  DROP_EXCLUDED_FROM_DELIVERABLE: booleanFromEnv.default(false),
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  LOG_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
  CATALOG_PATH: z.string().min(1).optional(),
  INPUT_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.LO_THRESHOLD > parsed.data.HI_THRESHOLD) {
    throw new Error(
      `Invalid environment configuration: LO_THRESHOLD (${parsed.data.LO_THRESHOLD}) must be <= HI_THRESHOLD (${parsed.data.HI_THRESHOLD})`,
    );
  }

  if (parsed.data.PROBLEMATIC_THRESHOLD > parsed.data.LO_THRESHOLD) {
    throw new Error(
      `Invalid environment configuration: PROBLEMATIC_THRESHOLD (${parsed.data.PROBLEMATIC_THRESHOLD}) should not be higher than LO_THRESHOLD (${parsed.data.LO_THRESHOLD})`,
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}

