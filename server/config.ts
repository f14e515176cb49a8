import path from "path";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  SQLITE_PATH: z.string().min(1).default(path.join("instance", "shop.db")),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(24),
  ITEM_MUTATION_ROLE: z.enum(["any", "admin"]).default("any"),
  UPDATE_COMMAND: z.string().trim().min(1).default("git pull --ff-only"),
  UPDATE_INSTALL: booleanFlag.default("true"),
  APP_DIR: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  sqlitePath: string;
  sessionTtlMs: number;
  itemMutationRole: "any" | "admin";
  appDir: string;
  // Each step is a program followed by its arguments
  updateSteps: string[][];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`[Config] ${fromZodError(parsed.error).message}`);
  }

  const vars = parsed.data;
  const updateSteps = [vars.UPDATE_COMMAND.split(/\s+/)];
  if (vars.UPDATE_INSTALL) {
    updateSteps.push(["npm", "install"]);
  }

  return {
    port: vars.PORT,
    host: vars.HOST,
    sqlitePath: vars.SQLITE_PATH,
    sessionTtlMs: vars.SESSION_TTL_HOURS * 60 * 60 * 1000,
    itemMutationRole: vars.ITEM_MUTATION_ROLE,
    appDir: vars.APP_DIR ?? process.cwd(),
    updateSteps,
  };
}
