import type {
  ActivityCatalog,
  ActivityEntry,
  Goal,
  HealthTopic,
  KnowledgeCatalog,
} from "@fitlog/shared";

/**
 * MET values per activity. Order matters: the parser picks the first key that
 * occurs anywhere in the text ("rowing" also matches inside "growing").
 */
export const ACTIVITY_ENTRIES: readonly ActivityEntry[] = Object.freeze([
  { name: "walking", met: 3.5 },
  { name: "running", met: 7.5 },
  { name: "cycling", met: 6.8 },
  { name: "swimming", met: 5.8 },
  { name: "yoga", met: 2.5 },
  { name: "weights", met: 4.0 },
  { name: "dancing", met: 5.0 },
  { name: "aerobics", met: 6.0 },
  { name: "hiking", met: 6.0 },
  { name: "jumping rope", met: 10.0 },
  { name: "rowing", met: 7.0 },
  { name: "riding", met: 4.5 },
  { name: "skating", met: 7.0 },
  { name: "football", met: 8.0 },
  { name: "basketball", met: 6.5 },
]);

/** MET used when an activity has no catalog entry. */
export const DEFAULT_MET = 3.5;

/**
 * Health topics, matched by substring in declaration order:
 * diabetes, high blood pressure, obesity, headache, fatigue.
 */
export const HEALTH_TOPICS: readonly HealthTopic[] = Object.freeze([
  {
    key: "diabetes",
    description:
      "A chronic condition that affects how your body turns food into energy.",
    tips: [
      "Follow a low-carb, high-fiber diet.",
      "Exercise regularly (e.g., walking, cycling).",
      "Monitor blood sugar daily.",
      "Avoid sugary snacks and beverages.",
    ],
  },
  {
    key: "high blood pressure",
    description:
      "Also called hypertension; can lead to heart issues if untreated.",
    tips: [
      "Reduce salt intake.",
      "Exercise daily for 30 minutes.",
      "Avoid smoking and alcohol.",
      "Eat potassium-rich foods like bananas.",
    ],
  },
  {
    key: "obesity",
    description: "A medical condition involving excess body fat.",
    tips: [
      "Eat in a calorie deficit.",
      "Avoid processed food and sugars.",
      "Drink water before meals.",
      "Walk at least 10,000 steps daily.",
    ],
  },
  {
    key: "headache",
    description:
      "Pain in the head region, often due to stress, dehydration, or sleep issues.",
    tips: [
      "Drink plenty of water.",
      "Practice stress-relieving activities like meditation.",
      "Avoid excessive screen time.",
      "Get 7-8 hours of sleep.",
    ],
  },
  {
    key: "fatigue",
    description: "Feeling overtired, with low energy and motivation.",
    tips: [
      "Ensure consistent sleep schedule (7-8 hrs).",
      "Stay hydrated.",
      "Limit caffeine late in the day.",
      "Take short walks to refresh energy.",
    ],
  },
]);

export const ACTIVITY_CATALOG: ActivityCatalog = new Map(
  ACTIVITY_ENTRIES.map(({ name, met }): [string, number] => [name, met]),
);

export const HEALTH_KNOWLEDGE_BASE: KnowledgeCatalog = new Map(
  HEALTH_TOPICS.map(
    ({ key, description, tips }): [string, Omit<HealthTopic, "key">] => [
      key,
      Object.freeze({ description, tips: Object.freeze([...tips]) }),
    ],
  ),
);

export const FOOD_RECOMMENDATIONS: Readonly<Record<Goal, readonly string[]>> =
  Object.freeze({
    gain: [
      "Peanut butter toast",
      "Chicken breast + rice",
      "Oats with banana",
      "Eggs",
      "Milkshake",
    ],
    maintain: [
      "Veg sandwich",
      "Tofu stir-fry",
      "Paneer salad",
      "Fruit bowl",
      "Greek yogurt",
    ],
    lose: ["Boiled eggs", "Soup", "Veg wrap", "Cucumber salad", "Green tea"],
  });

/**
 * BMI goal bands. Both bounds of the maintain band are inclusive.
 */
export const BMI_THRESHOLDS = {
  underweightBelow: 18.5,
  overweightAbove: 24.9,
} as const;

/** Bounds for manually entered body measurements and workout durations. */
export const INPUT_BOUNDS = {
  weightKg: { min: 40, max: 200 },
  heightCm: { min: 140, max: 220 },
  durationMinutes: { min: 1, max: 24 * 60 },
} as const;
