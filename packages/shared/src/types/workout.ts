export type Goal = "gain" | "maintain" | "lose";

export interface ActivityEntry {
  name: string;
  met: number;
}

export interface HealthTopic {
  key: string;
  description: string;
  tips: readonly string[];
}

export type ActivityCatalog = ReadonlyMap<string, number>;

export type KnowledgeCatalog = ReadonlyMap<string, Omit<HealthTopic, "key">>;

export interface ParsedWorkout {
  activity: string;
  duration_minutes: number;
}

/**
 * One logged workout. `activity` holds the display label ("Jumping rope"),
 * not the catalog key.
 */
export interface WorkoutRecord {
  date: string;
  activity: string;
  duration_minutes: number;
  calories: number;
  weight_kg: number;
  height_cm: number;
  bmi: number;
}

export interface CaloriesByActivity {
  activity: string;
  calories: number;
}

export interface SessionSummary {
  total: number;
  recent: WorkoutRecord[];
  caloriesByActivity: CaloriesByActivity[];
  goal: Goal | null;
  foods: string[];
}
