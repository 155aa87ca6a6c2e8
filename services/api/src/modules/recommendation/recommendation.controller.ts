import { Request, Response } from "express";
import { recommendationService } from "./recommendation.service";
import { HealthSuggestionBody } from "./recommendation.validation";

export class RecommendationController {
    /**
     * GET /recommendations/foods/:goal
     * Unknown goals answer with an empty list rather than an error
     */
    async getFoods(req: Request, res: Response) {
        const { goal } = req.params;

        res.json({
            success: true,
            data: {
                goal,
                foods: recommendationService.foods(goal),
            },
        });
    }

    /**
     * POST /recommendations/health
     */
    async getHealthSuggestion(
        req: Request<Record<string, string>, unknown, HealthSuggestionBody>,
        res: Response,
    ) {
        res.json({
            success: true,
            data: recommendationService.healthSuggestion(req.body.query),
        });
    }
}

export const recommendationController = new RecommendationController();
