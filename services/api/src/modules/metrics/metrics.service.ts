import type { Goal } from "@fitlog/shared";
import { calculateBmi, determineGoal } from "../../lib/fitnessMetrics";
import { foodRecommendation } from "../../lib/recommendations";

export interface BodyMetrics {
    weight_kg: number;
    height_cm: number;
    bmi: number;
    goal: Goal;
    foods: string[];
}

export class MetricsService {
    /**
     * BMI, the goal it implies and the foods suggested for that goal
     */
    bodyMetrics(weightKg: number, heightCm: number): BodyMetrics {
        const bmi = calculateBmi(weightKg, heightCm);
        const goal = determineGoal(bmi);

        return {
            weight_kg: weightKg,
            height_cm: heightCm,
            bmi,
            goal,
            foods: foodRecommendation(goal),
        };
    }
}

export const metricsService = new MetricsService();
