import { Router } from "express";
import { workoutController } from "./workout.controller";
import { validate } from "../../middleware/validate";
import { asyncHandler } from "../../utils/asyncHandler";
import { burstLimiter } from "../../middleware/rateLimiter";
import {
    estimateCaloriesSchema,
    parseWorkoutSchema,
} from "./workout.validation";

const router = Router();

/**
 * GET /workouts/activities
 * Known activities and their MET values, in matching order
 */
router.get(
    "/activities",
    asyncHandler((req, res) => workoutController.listActivities(req, res)),
);

/**
 * POST /workouts/parse
 * Body: { text: "I did 30 minutes of cycling" }
 */
router.post(
    "/parse",
    burstLimiter,
    validate(parseWorkoutSchema),
    asyncHandler((req, res) => workoutController.parse(req, res)),
);

/**
 * POST /workouts/calories
 * Body: { activity, duration_minutes, weight_kg }
 */
router.post(
    "/calories",
    burstLimiter,
    validate(estimateCaloriesSchema),
    asyncHandler((req, res) => workoutController.estimateCalories(req, res)),
);

export const workoutRoutes = router;
