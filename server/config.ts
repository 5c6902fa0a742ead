import "dotenv/config";
import { z, ZodError } from "zod";

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().positive().default(5000),
  databaseUrl: z.string({ required_error: "DATABASE_URL must be set. Did you forget to provision a database?" }).min(1),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV || undefined,
    port: env.PORT || undefined,
    databaseUrl: env.DATABASE_URL || undefined,
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return parseConfig(env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error("\n❌ Invalid configuration:\n");
      error.issues.forEach((issue) => {
        console.error(`  ${issue.path.join(".")}: ${issue.message}`);
      });
      console.error("\nCheck .env file and compare with .env.example\n");
    } else {
      console.error("Config error:", error);
    }
    process.exit(1);
  }
}
