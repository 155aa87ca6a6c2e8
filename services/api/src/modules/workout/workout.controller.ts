import { Request, Response } from "express";
import { workoutService } from "./workout.service";
import { EstimateCaloriesBody, ParseWorkoutBody } from "./workout.validation";

export class WorkoutController {
    /**
     * GET /workouts/activities
     */
    async listActivities(_req: Request, res: Response) {
        res.json({
            success: true,
            data: workoutService.activities(),
        });
    }

    /**
     * POST /workouts/parse
     * Extract activity and duration from a free-text description
     */
    async parse(
        req: Request<Record<string, string>, unknown, ParseWorkoutBody>,
        res: Response,
    ) {
        const parsed = workoutService.parse(req.body.text);

        res.json({
            success: true,
            data: parsed,
        });
    }

    /**
     * POST /workouts/calories
     */
    async estimateCalories(
        req: Request<Record<string, string>, unknown, EstimateCaloriesBody>,
        res: Response,
    ) {
        const { activity, duration_minutes, weight_kg } = req.body;

        res.json({
            success: true,
            data: workoutService.estimate(activity, duration_minutes, weight_kg),
        });
    }
}

export const workoutController = new WorkoutController();
