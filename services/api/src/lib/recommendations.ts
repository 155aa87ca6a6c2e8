import type { Goal, HealthTopic, KnowledgeCatalog } from "@fitlog/shared";
import { FOOD_RECOMMENDATIONS, HEALTH_KNOWLEDGE_BASE } from "@fitlog/constants";

export const HEALTH_NOT_FOUND_MESSAGE =
    "Sorry, we couldn’t find suggestions for that issue. Try general terms like 'diabetes', 'headache', or 'fatigue'.";

const isGoal = (value: string): value is Goal =>
    Object.prototype.hasOwnProperty.call(FOOD_RECOMMENDATIONS, value);

/** Five foods for the goal, or an empty list for anything else. */
export function foodRecommendation(goal: string): string[] {
    return isGoal(goal) ? [...FOOD_RECOMMENDATIONS[goal]] : [];
}

/**
 * First topic whose key occurs in the query, in catalog order. "headache and
 * fatigue" resolves to headache because it is declared first.
 */
export function findHealthTopic(
    query: string,
    knowledge: KnowledgeCatalog = HEALTH_KNOWLEDGE_BASE,
): HealthTopic | null {
    const normalized = query.toLowerCase().trim();
    for (const [key, entry] of knowledge) {
        if (normalized.includes(key)) {
            return { key, description: entry.description, tips: entry.tips };
        }
    }
    return null;
}

export function formatHealthTopic(topic: HealthTopic): string {
    const tips = topic.tips.map((tip) => `- ${tip}`).join("\n");
    return `**${topic.description}**\n\n**Tips:**\n${tips}`;
}

export function healthSuggestion(
    query: string,
    knowledge: KnowledgeCatalog = HEALTH_KNOWLEDGE_BASE,
): string {
    const topic = findHealthTopic(query, knowledge);
    return topic ? formatHealthTopic(topic) : HEALTH_NOT_FOUND_MESSAGE;
}
