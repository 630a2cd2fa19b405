/**
 * config.ts — Environment validation using Zod
 * Validated on startup. The process exits immediately if anything is invalid.
 * Secrets live in .env only — never in code or logs.
 */

import { z } from "zod";
import "dotenv/config";

const numeric = (fallback: string) =>
    z
        .string()
        .regex(/^\d+$/)
        .default(fallback)
        .transform(Number);

export const envSchema = z.object({
    /** Supabase project URL (from Project Settings → API) */
    SUPABASE_URL: z.string().url().optional().or(z.literal("")).default(""),

    /** Supabase service-role secret key — preferred credential */
    SUPABASE_SERVICE_ROLE_KEY: z.string().default(""),

    /** Supabase anon key — used only when no service-role key is set */
    SUPABASE_ANON_KEY: z.string().default(""),

    /** Base URL of the remote API that owns books, cakes and the crochet toggle */
    UPSTREAM_API_URL: z.string().url().default("https://lilazul-api.onrender.com"),

    /** Interface the HTTP front door binds to */
    HOST: z.string().default("0.0.0.0"),

    /** Port the HTTP front door listens on */
    PORT: numeric("8000"),

    /** Log level */
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.output<typeof envSchema>;

/** Validate an environment without side effects. */
export function parseConfig(env: NodeJS.ProcessEnv) {
    return envSchema.safeParse(env);
}

function loadConfig(): Config {
    const result = parseConfig(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment configuration:\n");
        for (const issue of result.error.issues) {
            console.error(`  • ${issue.path.join(".")}: ${issue.message}`);
        }
        console.error("\nCopy .env.example to .env and fill in your values.\n");
        process.exit(1);
    }
    return Object.freeze(result.data);
}

export const config = loadConfig();
