import { z } from "zod";
import {
    heightCmSchema,
    weightKgSchema,
    workoutTextSchema,
} from "../workout/workout.validation";

export const sessionParamsSchema = z.object({
    params: z.object({
        sessionId: z.string().uuid("Invalid session id"),
    }),
});

/**
 * POST /sessions/:sessionId/workouts
 */
export const logWorkoutSchema = sessionParamsSchema.extend({
    body: z.object({
        text: workoutTextSchema,
        weight_kg: weightKgSchema,
        height_cm: heightCmSchema,
        date: z.string().regex(
            /^\d{4}-\d{2}-\d{2}$/,
            "Date must be in YYYY-MM-DD format",
        ).optional(),
    }),
});

/**
 * GET /sessions/:sessionId/workouts?limit=7
 */
export const workoutHistoryQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type LogWorkoutBody = z.infer<typeof logWorkoutSchema>["body"];
