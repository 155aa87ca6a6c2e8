import type { HealthTopic, KnowledgeCatalog } from "@fitlog/shared";
import { HEALTH_KNOWLEDGE_BASE } from "@fitlog/constants";
import {
    findHealthTopic,
    foodRecommendation,
    formatHealthTopic,
    HEALTH_NOT_FOUND_MESSAGE,
} from "../../lib/recommendations";
import { logger } from "../../utils/logger";

export interface HealthSuggestion {
    suggestion: string;
    topic: HealthTopic | null;
}

export class RecommendationService {
    constructor(
        private readonly knowledge: KnowledgeCatalog = HEALTH_KNOWLEDGE_BASE,
    ) {}

    foods(goal: string): string[] {
        return foodRecommendation(goal);
    }

    healthSuggestion(query: string): HealthSuggestion {
        const topic = findHealthTopic(query, this.knowledge);

        if (!topic) {
            logger.debug("No health topic matched query", {
                length: query.length,
            });
            return { suggestion: HEALTH_NOT_FOUND_MESSAGE, topic: null };
        }

        return { suggestion: formatHealthTopic(topic), topic };
    }
}

export const recommendationService = new RecommendationService();
