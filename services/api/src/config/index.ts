import dotenv from "dotenv";
dotenv.config();

const nodeEnv = process.env.NODE_ENV || "development";

const corsOriginsEnv = process.env.CORS_ORIGIN ?? process.env.CORS_ORIGINS ?? "";
const parsedCorsOrigins = corsOriginsEnv
    .split(",")
    .map((origin) => origin.trim().replace(/^['"]|['"]$/g, ""))
    .filter(Boolean);

if (nodeEnv === "production" && parsedCorsOrigins.length === 0) {
    console.error(
        "CORS_ORIGIN (or CORS_ORIGINS) must be set in production (comma-separated origins)",
    );
    process.exit(1);
}

export const config = {
    port: Number(process.env.PORT) || 3000,
    nodeEnv,

    rateLimit: {
        windowMs: Number(process.env.RATE_LIMIT_WINDOW_MS) || 15 * 60 * 1000,
        max: Number(process.env.RATE_LIMIT_MAX) || 100,
    },

    cors: {
        origin: parsedCorsOrigins.length > 0 ? parsedCorsOrigins : true,
        credentials: true,
    },

    logging: {
        level: process.env.LOG_LEVEL || (nodeEnv === "test" ? "silent" : "info"),
    },

    sessions: {
        max: Number(process.env.SESSION_MAX) || 1000,
        historyDefault: Number(process.env.SESSION_HISTORY_DEFAULT) || 7,
    },
} as const;

// Type export for config
export type Config = typeof config;
