import { z } from "zod";

// Grammars that accept `default` as a name and keep every identifier segment.
export const SQL_DIALECTS = ["TransactSQL"] as const;

export const DEFAULT_DIALECT: SqlDialect = "TransactSQL";

export type SqlDialect = (typeof SQL_DIALECTS)[number];

export const configSchema = z.object({
  kubeconfig: z
    .object({
      path: z.string().min(1).optional(),
    })
    .default({}),
  parser: z
    .object({
      dialect: z.enum(SQL_DIALECTS).default(DEFAULT_DIALECT),
    })
    .default({}),
  cluster: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(3),
      retryDelayMs: z.number().int().min(0).max(60000).default(500),
    })
    .default({}),
  output: z
    .object({
      format: z.enum(["table", "json"]).default("table"),
      color: z.boolean().default(true),
    })
    .default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}
