import rateLimit, { Options } from "express-rate-limit";
import { Request, Response } from "express";
import { config } from "../config";
import { logger } from "../utils/logger";

// Session-scoped key when the route carries one, otherwise the client IP
const getSessionKey = (req: Request): string => {
    const sessionId = req.params.sessionId;
    if (sessionId) {
        return `session:${sessionId}`;
    }
    return `ip:${req.ip || req.socket.remoteAddress || "unknown"}`;
};

// Standard response for rate limit exceeded
const rateLimitResponse = (message: string) => ({
    success: false,
    error: {
        code: "RATE_LIMIT_EXCEEDED",
        message,
    },
});

const onLimitReached = (req: Request, _res: Response, options: Options) => {
    logger.warn("Rate limit exceeded", {
        requestId: req.requestId,
        key: getSessionKey(req),
        path: req.path,
        method: req.method,
        limit: options.limit,
    });
};

const limitHandler = (
    req: Request,
    res: Response,
    _next: unknown,
    options: Options,
) => {
    onLimitReached(req, res, options);
    res.status(options.statusCode).json(options.message);
};

/**
 * Global rate limiter - applies to all routes
 * RATE_LIMIT_MAX requests per RATE_LIMIT_WINDOW_MS per IP
 */
export const globalLimiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: rateLimitResponse("Too many requests, please try again later."),
    handler: limitHandler,
});

/**
 * Per-session write limiter - workouts logged and sessions opened or closed
 * 60 writes per 15 minutes
 */
export const sessionWriteLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 60,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getSessionKey,
    message: rateLimitResponse("Too many write operations. Please slow down."),
    handler: limitHandler,
});

/**
 * Per-session read limiter
 * 200 reads per 15 minutes
 */
export const sessionReadLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 200,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getSessionKey,
    message: rateLimitResponse("Too many requests. Please slow down."),
    handler: limitHandler,
});

/**
 * Burst protection - prevents rapid-fire requests
 * 20 requests per 10 seconds per session
 */
export const burstLimiter = rateLimit({
    windowMs: 10 * 1000, // 10 seconds
    limit: 20,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getSessionKey,
    message: rateLimitResponse(
        "Too many requests in a short time. Please slow down.",
    ),
    skipFailedRequests: true, // Don't count failed requests
    handler: limitHandler,
});
