import { z } from "zod";
import { INPUT_BOUNDS } from "@fitlog/constants";

export const weightKgSchema = z.number({
    required_error: "weight_kg is required",
    invalid_type_error: "weight_kg must be a number",
})
    .min(INPUT_BOUNDS.weightKg.min)
    .max(INPUT_BOUNDS.weightKg.max);

export const heightCmSchema = z.number({
    required_error: "height_cm is required",
    invalid_type_error: "height_cm must be a number",
})
    .min(INPUT_BOUNDS.heightCm.min)
    .max(INPUT_BOUNDS.heightCm.max);

export const workoutTextSchema = z.string({
    required_error: "Describe your workout, e.g. 'I did 30 minutes of cycling'",
})
    .trim()
    .min(1, "Describe your workout, e.g. 'I did 30 minutes of cycling'")
    .max(500);

/**
 * POST /workouts/parse
 */
export const parseWorkoutSchema = z.object({
    body: z.object({
        text: workoutTextSchema,
    }),
});

/**
 * POST /workouts/calories
 */
export const estimateCaloriesSchema = z.object({
    body: z.object({
        activity: z.string().trim().toLowerCase().min(1).max(50),
        duration_minutes: z.number()
            .int()
            .min(INPUT_BOUNDS.durationMinutes.min)
            .max(INPUT_BOUNDS.durationMinutes.max),
        weight_kg: weightKgSchema,
    }),
});

export type ParseWorkoutBody = z.infer<typeof parseWorkoutSchema>["body"];
export type EstimateCaloriesBody = z.infer<typeof estimateCaloriesSchema>["body"];
