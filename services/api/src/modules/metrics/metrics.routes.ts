import { Router } from "express";
import { metricsController } from "./metrics.controller";
import { validate } from "../../middleware/validate";
import { asyncHandler } from "../../utils/asyncHandler";
import { burstLimiter } from "../../middleware/rateLimiter";
import { bodyMetricsSchema } from "./metrics.validation";

const router = Router();

// BMI + goal + food suggestions for the given weight and height
router.post(
    "/bmi",
    burstLimiter,
    validate(bodyMetricsSchema),
    asyncHandler((req, res) => metricsController.getBodyMetrics(req, res)),
);

export const metricsRoutes = router;
