import type { CaloriesByActivity, WorkoutRecord } from "@fitlog/shared";
import { round2 } from "./fitnessMetrics";

/**
 * Append-only workout table owned by a single session. Records are never
 * removed or reordered.
 */
export class SessionLog {
    private readonly records: WorkoutRecord[] = [];

    get size(): number {
        return this.records.length;
    }

    get isEmpty(): boolean {
        return this.records.length === 0;
    }

    append(record: WorkoutRecord): void {
        this.records.push(record);
    }

    /** Last `n` records, oldest first. */
    tail(n: number): WorkoutRecord[] {
        const count = Number.isFinite(n) ? Math.floor(n) : 0;
        if (count <= 0) return [];
        return this.records.slice(-count);
    }

    latest(): WorkoutRecord | null {
        return this.records.length > 0
            ? this.records[this.records.length - 1]
            : null;
    }

    toArray(): WorkoutRecord[] {
        return [...this.records];
    }

    /**
     * Calories summed per activity label. Group order is for display only.
     */
    aggregateCaloriesByActivity(): CaloriesByActivity[] {
        const totals = new Map<string, number>();
        for (const record of this.records) {
            totals.set(
                record.activity,
                (totals.get(record.activity) ?? 0) + record.calories,
            );
        }
        return Array.from(totals, ([activity, calories]) => ({
            activity,
            calories: round2(calories),
        }));
    }
}
