import { NextFunction, Request, Response } from "express";
import { z } from "zod";

type RequestShape = {
    body?: unknown;
    params?: Record<string, string>;
    query?: unknown;
};

/**
 * Validates body, params and query against a zod schema of the form
 * `z.object({ body, params, query })`. Parsed body and params replace the raw
 * ones so handlers see trimmed and coerced values. Failures reach the error
 * handler as a ZodError.
 */
export const validate = (
    schema: z.ZodType<RequestShape, z.ZodTypeDef, unknown>,
) =>
(req: Request, _res: Response, next: NextFunction) => {
    const parsed = schema.safeParse({
        body: req.body,
        params: req.params,
        query: req.query,
    });

    if (!parsed.success) {
        return next(parsed.error);
    }

    if (parsed.data.body !== undefined) {
        req.body = parsed.data.body;
    }
    if (parsed.data.params !== undefined) {
        req.params = parsed.data.params;
    }

    next();
};
