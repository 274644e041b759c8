import { z } from "zod";

export interface DatabaseConfig {
  url?: string;
}

export interface ClockConfig {
  genesisTime: number;
  blockIntervalMs: number;
}

export interface AppConfig {
  port: number;
  registryOwner: string;
  database: DatabaseConfig;
  clock: ClockConfig;
}

export const appConfigSchema = z.object({
  port: z.number().int().nonnegative(),
  registryOwner: z.string().min(1, "REGISTRY_OWNER must be set"),
  database: z.object({
    url: z.string().min(1).optional(),
  }),
  clock: z.object({
    genesisTime: z.number().int().nonnegative(),
    blockIntervalMs: z.number().int().positive(),
  }),
});

type Env = Record<string, string | undefined>;

/** Block 0 starts at the Unix epoch unless GENESIS_TIME moves it. */
export const DEFAULT_GENESIS_TIME = 0;

export function loadConfig(env: Env = process.env): AppConfig {
  return appConfigSchema.parse({
    port: Number(env.PORT ?? "8080"),
    registryOwner: env.REGISTRY_OWNER ?? "",
    database: {
      url: env.DATABASE_URL || undefined,
    },
    clock: {
      genesisTime: Number(env.GENESIS_TIME ?? String(DEFAULT_GENESIS_TIME)),
      blockIntervalMs: Number(env.BLOCK_INTERVAL_MS ?? "10000"),
    },
  });
}
