import { config } from "../config";

type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
    silent: -1,
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

const isKnownLevel = (level: string): level is keyof typeof LEVEL_RANK =>
    level in LEVEL_RANK;

const activeRank = (): number => {
    const level = config.logging.level;
    return isKnownLevel(level) ? LEVEL_RANK[level] : LEVEL_RANK.info;
};

const enabled = (level: LogLevel) => LEVEL_RANK[level] <= activeRank();

type Meta = Record<string, unknown>;

export const logger = {
    debug: (message: string, meta?: Meta) => {
        if (!enabled("debug")) return;
        console.debug(JSON.stringify({
            level: "debug",
            message,
            timestamp: new Date().toISOString(),
            ...meta,
        }));
    },
    info: (message: string, meta?: Meta) => {
        if (!enabled("info")) return;
        console.log(JSON.stringify({
            level: "info",
            message,
            timestamp: new Date().toISOString(),
            ...meta,
        }));
    },
    error: (message: string, error?: unknown) => {
        if (!enabled("error")) return;
        console.error(JSON.stringify({
            level: "error",
            message,
            timestamp: new Date().toISOString(),
            error: error instanceof Error ? error.message : error,
            stack: error instanceof Error ? error.stack : undefined,
        }));
    },
    warn: (message: string, meta?: Meta) => {
        if (!enabled("warn")) return;
        console.warn(JSON.stringify({
            level: "warn",
            message,
            timestamp: new Date().toISOString(),
            ...meta,
        }));
    },
};
