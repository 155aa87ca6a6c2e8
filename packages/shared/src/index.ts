export * from "./types/workout";
