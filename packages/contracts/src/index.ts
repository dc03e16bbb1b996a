export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/search";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
