import express from "express";
import cors from "cors";
import helmet from "helmet";

import { config } from "./config";

// Middleware
import { globalLimiter } from "./middleware/rateLimiter";
import { requestIdMiddleware } from "./middleware/requestId";
import { requestLogger } from "./middleware/requestLogger";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

// Routes
import { healthRoutes } from "./routes/health";
import { workoutRoutes } from "./modules/workout/workout.routes";
import { metricsRoutes } from "./modules/metrics/metrics.routes";
import { recommendationRoutes } from "./modules/recommendation/recommendation.routes";
import { sessionRoutes } from "./modules/session/session.routes";

export function createApp() {
    const app = express();

    // Security middleware
    app.use(helmet());

    // Request ID middleware (must be first for tracking)
    app.use(requestIdMiddleware);

    app.use(cors({
        origin: config.cors.origin,
        credentials: config.cors.credentials,
        methods: ["GET", "POST", "DELETE", "OPTIONS"],
        allowedHeaders: ["Content-Type", "X-Request-ID"],
    }));

    // Body parsing
    app.use(express.json({ limit: "100kb" }));

    // Request logging (after body parsing)
    app.use(requestLogger);

    // Rate limiting (skip for health checks)
    app.use((req, res, next) => {
        if (req.path === "/health") {
            return next();
        }
        globalLimiter(req, res, next);
    });

    // Routes
    app.use("/health", healthRoutes);
    app.use("/api/workouts", workoutRoutes);
    app.use("/api/metrics", metricsRoutes);
    app.use("/api/recommendations", recommendationRoutes);
    app.use("/api/sessions", sessionRoutes);

    // 404 handler
    app.use(notFoundHandler);

    // Global error handler (must be last)
    app.use(errorHandler);

    return app;
}
