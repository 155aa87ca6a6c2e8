import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { AppError } from "../utils/AppError";
import { logger } from "../utils/logger";
import { config } from "../config";

// body-parser errors carry an HTTP status and a `type` such as
// "entity.too.large" or "entity.parse.failed".
const BODY_ERROR_CODES: Record<string, string> = {
    "entity.parse.failed": "INVALID_JSON",
    "entity.too.large": "PAYLOAD_TOO_LARGE",
    "encoding.unsupported": "UNSUPPORTED_ENCODING",
    "charset.unsupported": "UNSUPPORTED_CHARSET",
};

interface ClientError {
    status: number;
    code: string;
}

const toClientError = (err: Error): ClientError | null => {
    const status = "status" in err ? err.status : undefined;
    if (typeof status !== "number" || status < 400 || status >= 500) {
        return null;
    }
    const type = "type" in err && typeof err.type === "string" ? err.type : "";
    return {
        status,
        code: BODY_ERROR_CODES[type] ?? "BAD_REQUEST",
    };
};

/**
 * Global error handler middleware
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction,
) => {
    const clientError = err instanceof AppError ? null : toClientError(err);
    const expected = err instanceof ZodError ||
        clientError !== null ||
        (err instanceof AppError && err.isOperational);

    const meta = {
        requestId: req.requestId,
        error: err.message,
        stack: config.nodeEnv === "development" ? err.stack : undefined,
        path: req.path,
        method: req.method,
    };

    if (expected) {
        logger.warn("Request rejected", meta);
    } else {
        logger.error("Error occurred", meta);
    }

    // Handle AppError instances
    if (err instanceof AppError) {
        return res.status(err.statusCode).json({
            success: false,
            error: {
                code: err.code,
                message: err.message,
            },
            requestId: req.requestId,
        });
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        return res.status(400).json({
            success: false,
            error: {
                code: "VALIDATION_ERROR",
                message: err.issues[0]?.message ?? "Validation failed",
                details: err.issues,
            },
            requestId: req.requestId,
        });
    }

    // Malformed, oversized or undecodable bodies from express.json()
    if (clientError !== null) {
        return res.status(clientError.status).json({
            success: false,
            error: {
                code: clientError.code,
                message: clientError.code === "INVALID_JSON"
                    ? "Request body is not valid JSON"
                    : err.message,
            },
            requestId: req.requestId,
        });
    }

    // Handle unknown errors
    const statusCode = 500;
    const message = config.nodeEnv === "production"
        ? "Internal server error"
        : err.message;

    return res.status(statusCode).json({
        success: false,
        error: {
            code: "INTERNAL_ERROR",
            message,
        },
        requestId: req.requestId,
    });
};

/**
 * Handle 404 - Route not found
 */
export const notFoundHandler = (
    req: Request,
    res: Response,
    _next: NextFunction,
) => {
    res.status(404).json({
        success: false,
        error: {
            code: "NOT_FOUND",
            message: `Route ${req.method} ${req.path} not found`,
        },
        requestId: req.requestId,
    });
};
