import { Request, Response } from "express";
import { metricsService } from "./metrics.service";
import { BodyMetricsBody } from "./metrics.validation";

export class MetricsController {
    /**
     * POST /metrics/bmi
     */
    async getBodyMetrics(
        req: Request<Record<string, string>, unknown, BodyMetricsBody>,
        res: Response,
    ) {
        const { weight_kg, height_cm } = req.body;

        res.json({
            success: true,
            data: metricsService.bodyMetrics(weight_kg, height_cm),
        });
    }
}

export const metricsController = new MetricsController();
