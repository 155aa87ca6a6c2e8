import { Router } from "express";
import { recommendationController } from "./recommendation.controller";
import { validate } from "../../middleware/validate";
import { asyncHandler } from "../../utils/asyncHandler";
import { burstLimiter } from "../../middleware/rateLimiter";
import {
    foodRecommendationSchema,
    healthSuggestionSchema,
} from "./recommendation.validation";

const router = Router();

/**
 * GET /recommendations/foods/:goal
 */
router.get(
    "/foods/:goal",
    validate(foodRecommendationSchema),
    asyncHandler((req, res) => recommendationController.getFoods(req, res)),
);

/**
 * POST /recommendations/health
 * Body: { query: "I keep getting a headache" }
 */
router.post(
    "/health",
    burstLimiter,
    validate(healthSuggestionSchema),
    asyncHandler((req, res) =>
        recommendationController.getHealthSuggestion(req, res)
    ),
);

export const recommendationRoutes = router;
