export * from "./activityConstants";
