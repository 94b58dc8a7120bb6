/**
 * Server configuration
 *
 * Read once from the environment (populated from .env by dotenv in index.ts).
 * An invalid value throws at import.
 */

import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  // Journey planner (Transport for London)
  TFL_API_BASE_URL: z.string().url().default("https://api.tfl.gov.uk"),
  TFL_APP_KEY: z.string().optional(),

  // Postcode lookup
  POSTCODES_API_BASE_URL: z.string().url().default("https://api.postcodes.io"),

  // Applies to every outbound provider call
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  SEARCH_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
});

export type ServerConfig = z.infer<typeof envSchema>;

export const config: ServerConfig = envSchema.parse(process.env);
