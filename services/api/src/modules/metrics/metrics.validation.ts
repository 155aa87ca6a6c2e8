import { z } from "zod";
import { heightCmSchema, weightKgSchema } from "../workout/workout.validation";

export const bodyMetricsSchema = z.object({
    body: z.object({
        weight_kg: weightKgSchema,
        height_cm: heightCmSchema,
    }),
});

export type BodyMetricsBody = z.infer<typeof bodyMetricsSchema>["body"];
