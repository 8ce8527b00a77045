import path from "path";
import { config } from "dotenv";
import { z } from "zod";

config({
    path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    ADMIN_API_TOKEN: z.string().min(8),
    /** sync: re-score inside the edit request; queue: hand off to the BullMQ worker. */
    RECALCULATION_MODE: z.enum(["sync", "queue"]).default("sync"),
    RECALC_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    RECALC_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        const issueText = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid environment variables: ${issueText}`);
    }

    return parsed.data;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
    if (!cachedEnv) {
        cachedEnv = parseEnv(process.env);
    }
    return cachedEnv;
}
