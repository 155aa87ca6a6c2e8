import { z } from "zod";

export const healthSuggestionSchema = z.object({
    body: z.object({
        query: z.string({ required_error: "Please type something!" })
            .trim()
            .min(1, "Please type something!")
            .max(500),
    }),
});

export const foodRecommendationSchema = z.object({
    params: z.object({
        goal: z.string().trim().max(20),
    }),
});

export type HealthSuggestionBody = z.infer<typeof healthSuggestionSchema>["body"];
