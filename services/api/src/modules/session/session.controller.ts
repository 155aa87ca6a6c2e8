import { Request, Response } from "express";
import { config } from "../../config";
import { sessionService } from "./session.service";
import {
    LogWorkoutBody,
    workoutHistoryQuerySchema,
} from "./session.validation";

export class SessionController {
    /**
     * POST /sessions
     * Start a new, empty workout log
     */
    async createSession(_req: Request, res: Response) {
        const session = sessionService.create();

        res.status(201).json({
            success: true,
            data: session,
        });
    }

    /**
     * DELETE /sessions/:sessionId
     */
    async endSession(req: Request, res: Response) {
        sessionService.end(req.params.sessionId);

        res.json({
            success: true,
            data: { ended: true },
        });
    }

    /**
     * POST /sessions/:sessionId/workouts
     */
    async logWorkout(
        req: Request<Record<string, string>, unknown, LogWorkoutBody>,
        res: Response,
    ) {
        const { text, weight_kg, height_cm, date } = req.body;
        const result = sessionService.logWorkout(req.params.sessionId, {
            text,
            weight_kg,
            height_cm,
            date,
        });

        res.status(201).json({
            success: true,
            data: result,
        });
    }

    /**
     * GET /sessions/:sessionId/workouts
     * Most recent workouts, oldest first
     */
    async getWorkouts(req: Request, res: Response) {
        const { limit } = workoutHistoryQuerySchema.parse(req.query);
        const { sessionId } = req.params;
        const records = sessionService.history(
            sessionId,
            limit ?? config.sessions.historyDefault,
        );

        res.json({
            success: true,
            data: {
                records,
                total: sessionService.getLog(sessionId).size,
            },
        });
    }

    /**
     * GET /sessions/:sessionId/summary
     */
    async getSummary(req: Request, res: Response) {
        res.json({
            success: true,
            data: sessionService.summary(req.params.sessionId),
        });
    }
}

export const sessionController = new SessionController();
