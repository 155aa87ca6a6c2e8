import crypto from "crypto";
import type {
    SessionSummary,
    WorkoutRecord,
} from "@fitlog/shared";
import { config } from "../../config";
import { SessionLog } from "../../lib/sessionLog";
import {
    buildWorkoutRecord,
    determineGoal,
    WorkoutInput,
} from "../../lib/fitnessMetrics";
import { foodRecommendation } from "../../lib/recommendations";
import { AppError } from "../../utils/AppError";
import { logger } from "../../utils/logger";

// ============================================================================
// TYPES
// ============================================================================

interface SessionEntry {
    log: SessionLog;
    createdAt: string;
}

export interface CreatedSession {
    sessionId: string;
    createdAt: string;
}

export interface LoggedWorkout {
    record: WorkoutRecord;
    message: string;
}

const SUMMARY_RECENT_COUNT = 7;

// ============================================================================
// SERVICE
// ============================================================================

/**
 * Holds one in-memory workout log per session. Nothing outlives the process;
 * once `maxSessions` is reached the oldest session is dropped.
 */
export class SessionService {
    private readonly sessions = new Map<string, SessionEntry>();

    constructor(
        private readonly maxSessions: number = config.sessions.max,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    get activeCount(): number {
        return this.sessions.size;
    }

    create(): CreatedSession {
        while (this.sessions.size >= this.maxSessions) {
            const oldest = this.sessions.keys().next();
            if (oldest.done) break;
            this.sessions.delete(oldest.value);
            logger.info("Session evicted", {
                sessionId: oldest.value,
                maxSessions: this.maxSessions,
            });
        }

        const sessionId = crypto.randomUUID();
        const createdAt = this.clock().toISOString();
        this.sessions.set(sessionId, { log: new SessionLog(), createdAt });

        logger.info("Session created", { sessionId });
        return { sessionId, createdAt };
    }

    getLog(sessionId: string): SessionLog {
        const entry = this.sessions.get(sessionId);
        if (!entry) {
            throw AppError.notFound(
                `Session ${sessionId} not found`,
                "SESSION_NOT_FOUND",
            );
        }
        return entry.log;
    }

    end(sessionId: string): void {
        const entry = this.sessions.get(sessionId);
        if (!entry) {
            throw AppError.notFound(
                `Session ${sessionId} not found`,
                "SESSION_NOT_FOUND",
            );
        }
        this.sessions.delete(sessionId);
        logger.info("Session ended", {
            sessionId,
            workouts: entry.log.size,
        });
    }

    /**
     * Parse, compute and append. Parsing errors propagate before the log is
     * touched.
     */
    logWorkout(sessionId: string, input: WorkoutInput): LoggedWorkout {
        const log = this.getLog(sessionId);
        const { activity, record } = buildWorkoutRecord(
            input,
            undefined,
            this.clock(),
        );

        log.append(record);
        logger.info("Workout logged", {
            sessionId,
            activity,
            duration_minutes: record.duration_minutes,
            calories: record.calories,
        });

        return {
            record,
            message:
                `Added ${activity} for ${record.duration_minutes} min - ~${record.calories} cal burned`,
        };
    }

    history(sessionId: string, limit: number): WorkoutRecord[] {
        return this.getLog(sessionId).tail(limit);
    }

    summary(sessionId: string): SessionSummary {
        const log = this.getLog(sessionId);
        const latest = log.latest();
        const goal = latest ? determineGoal(latest.bmi) : null;

        return {
            total: log.size,
            recent: log.tail(SUMMARY_RECENT_COUNT),
            caloriesByActivity: log.aggregateCaloriesByActivity(),
            goal,
            foods: goal ? foodRecommendation(goal) : [],
        };
    }
}

export const sessionService = new SessionService();
