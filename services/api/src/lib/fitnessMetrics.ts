import type {
    ActivityCatalog,
    Goal,
    WorkoutRecord,
} from "@fitlog/shared";
import {
    ACTIVITY_CATALOG,
    BMI_THRESHOLDS,
    DEFAULT_MET,
} from "@fitlog/constants";
import { InvalidHeightError } from "./errors";
import { parseWorkout } from "./workoutParser";

/**
 * Nearest value with two decimals, computed from the exact binary value of
 * `value`. Exact half-way cases round to the even hundredth, so
 * round2(1.005) is 1 and round2(0.125) is 0.12.
 */
export function round2(value: number): number {
    if (!Number.isFinite(value)) return value;
    // A double sits exactly between two hundredths only when it is an odd
    // multiple of 1/8; scaling by 8 and 100 is exact for those.
    const eighths = value * 8;
    if (Number.isInteger(eighths) && Math.abs(eighths % 2) === 1) {
        const lower = Math.floor(value * 100);
        return (lower % 2 === 0 ? lower : lower + 1) / 100;
    }
    return Number(value.toFixed(2));
}

/**
 * Calories burned: MET × weight (kg) × hours. Unknown activities fall back to
 * DEFAULT_MET.
 */
export function estimateCalories(
    activity: string,
    durationMinutes: number,
    weightKg: number,
    catalog: ActivityCatalog = ACTIVITY_CATALOG,
): number {
    const met = catalog.get(activity) ?? DEFAULT_MET;
    return round2(met * weightKg * (durationMinutes / 60));
}

export function calculateBmi(weightKg: number, heightCm: number): number {
    if (!Number.isFinite(heightCm) || heightCm <= 0) {
        throw new InvalidHeightError(heightCm);
    }
    const heightM = heightCm / 100;
    return round2(weightKg / (heightM * heightM));
}

export function determineGoal(bmi: number): Goal {
    if (bmi < BMI_THRESHOLDS.underweightBelow) return "gain";
    if (bmi <= BMI_THRESHOLDS.overweightAbove) return "maintain";
    return "lose";
}

/** "jumping rope" -> "Jumping rope" */
export function activityLabel(activity: string): string {
    if (activity.length === 0) return activity;
    return activity.charAt(0).toUpperCase() + activity.slice(1).toLowerCase();
}

/** Local calendar date as YYYY-MM-DD */
export function localDateKey(d: Date): string {
    const y = d.getFullYear();
    const m = String(d.getMonth() + 1).padStart(2, "0");
    const day = String(d.getDate()).padStart(2, "0");
    return `${y}-${m}-${day}`;
}

export interface WorkoutInput {
    text: string;
    weight_kg: number;
    height_cm: number;
    date?: string;
}

export interface BuiltWorkout {
    /** Catalog key the parser matched, e.g. "cycling" */
    activity: string;
    record: WorkoutRecord;
}

/**
 * Parses the description and computes every derived field. Throws before
 * anything is built when the text or height is unusable.
 */
export function buildWorkoutRecord(
    input: WorkoutInput,
    catalog: ActivityCatalog = ACTIVITY_CATALOG,
    now: Date = new Date(),
): BuiltWorkout {
    const { activity, duration_minutes } = parseWorkout(input.text, catalog);
    const bmi = calculateBmi(input.weight_kg, input.height_cm);
    const calories = estimateCalories(
        activity,
        duration_minutes,
        input.weight_kg,
        catalog,
    );

    const record: WorkoutRecord = Object.freeze({
        date: input.date ?? localDateKey(now),
        activity: activityLabel(activity),
        duration_minutes,
        calories,
        weight_kg: input.weight_kg,
        height_cm: input.height_cm,
        bmi,
    });

    return { activity, record };
}
