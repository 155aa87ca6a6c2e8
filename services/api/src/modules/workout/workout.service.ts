import type {
    ActivityCatalog,
    ActivityEntry,
    ParsedWorkout,
} from "@fitlog/shared";
import { ACTIVITY_CATALOG, DEFAULT_MET } from "@fitlog/constants";
import { parseWorkout } from "../../lib/workoutParser";
import { estimateCalories } from "../../lib/fitnessMetrics";
import { AppError } from "../../utils/AppError";
import { logger } from "../../utils/logger";

export interface CalorieEstimate {
    activity: string;
    duration_minutes: number;
    weight_kg: number;
    met: number;
    calories: number;
}

export class WorkoutService {
    constructor(private readonly catalog: ActivityCatalog = ACTIVITY_CATALOG) {}

    parse(text: string): ParsedWorkout {
        try {
            return parseWorkout(text, this.catalog);
        } catch (error) {
            if (error instanceof AppError) {
                logger.debug("Workout text rejected", {
                    code: error.code,
                    length: text.length,
                });
            }
            throw error;
        }
    }

    estimate(
        activity: string,
        durationMinutes: number,
        weightKg: number,
    ): CalorieEstimate {
        const met = this.catalog.get(activity);
        if (met === undefined) {
            logger.debug("No MET value for activity, using default", {
                activity,
            });
        }

        return {
            activity,
            duration_minutes: durationMinutes,
            weight_kg: weightKg,
            met: met ?? DEFAULT_MET,
            calories: estimateCalories(
                activity,
                durationMinutes,
                weightKg,
                this.catalog,
            ),
        };
    }

    activities(): ActivityEntry[] {
        return Array.from(this.catalog, ([name, met]) => ({ name, met }));
    }
}

export const workoutService = new WorkoutService();
