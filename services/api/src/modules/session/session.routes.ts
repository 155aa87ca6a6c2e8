import { Router } from "express";
import { sessionController } from "./session.controller";
import { validate } from "../../middleware/validate";
import { asyncHandler } from "../../utils/asyncHandler";
import {
    burstLimiter,
    sessionReadLimiter,
    sessionWriteLimiter,
} from "../../middleware/rateLimiter";
import { logWorkoutSchema, sessionParamsSchema } from "./session.validation";

const router = Router();

// ============================================================================
// SESSION LIFECYCLE
// ============================================================================

router.post(
    "/",
    burstLimiter,
    sessionWriteLimiter,
    asyncHandler((req, res) => sessionController.createSession(req, res)),
);

router.delete(
    "/:sessionId",
    burstLimiter,
    sessionWriteLimiter,
    validate(sessionParamsSchema),
    asyncHandler((req, res) => sessionController.endSession(req, res)),
);

// ============================================================================
// WORKOUT LOG
// ============================================================================

/**
 * POST /sessions/:sessionId/workouts
 * Body: { text, weight_kg, height_cm, date? }
 */
router.post(
    "/:sessionId/workouts",
    burstLimiter,
    sessionWriteLimiter,
    validate(logWorkoutSchema),
    asyncHandler((req, res) => sessionController.logWorkout(req, res)),
);

/**
 * GET /sessions/:sessionId/workouts
 * Query params: ?limit=7
 */
router.get(
    "/:sessionId/workouts",
    burstLimiter,
    sessionReadLimiter,
    validate(sessionParamsSchema),
    asyncHandler((req, res) => sessionController.getWorkouts(req, res)),
);

/**
 * GET /sessions/:sessionId/summary
 * Recent workouts, calories per activity and meal suggestions
 */
router.get(
    "/:sessionId/summary",
    burstLimiter,
    sessionReadLimiter,
    validate(sessionParamsSchema),
    asyncHandler((req, res) => sessionController.getSummary(req, res)),
);

export const sessionRoutes = router;
