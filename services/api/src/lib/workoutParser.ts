import type { ActivityCatalog, ParsedWorkout } from "@fitlog/shared";
import { ACTIVITY_CATALOG, INPUT_BOUNDS } from "@fitlog/constants";
import {
    DurationOutOfRangeError,
    MissingDurationError,
    UnknownActivityError,
} from "./errors";

// "30 minutes", "45 min", "20mins"; the first match wins.
const DURATION_PATTERN = /(\d+)\s*(min|minutes?)/;

/**
 * Returns the first catalog key contained in `text`, in catalog order.
 * Matching is plain substring search, so overlapping keys resolve by order.
 */
export function detectActivity(
    text: string,
    catalog: ActivityCatalog = ACTIVITY_CATALOG,
): string | null {
    const lowered = text.toLowerCase();
    for (const name of catalog.keys()) {
        if (lowered.includes(name)) return name;
    }
    return null;
}

export function detectDuration(text: string): number | null {
    const match = DURATION_PATTERN.exec(text.toLowerCase());
    if (!match) return null;
    return parseInt(match[1], 10);
}

/**
 * Extracts the activity and duration from a free-text workout description,
 * e.g. "I did 30 minutes of cycling".
 */
export function parseWorkout(
    text: string,
    catalog: ActivityCatalog = ACTIVITY_CATALOG,
): ParsedWorkout {
    const duration = detectDuration(text);
    if (duration === null || duration <= 0) {
        throw new MissingDurationError();
    }
    const { min, max } = INPUT_BOUNDS.durationMinutes;
    if (!Number.isSafeInteger(duration) || duration > max) {
        throw new DurationOutOfRangeError(min, max);
    }

    const activity = detectActivity(text, catalog);
    if (activity === null) {
        throw new UnknownActivityError();
    }

    return { activity, duration_minutes: duration };
}
