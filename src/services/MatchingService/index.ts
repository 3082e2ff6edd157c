export * from "./MatchingService";
export * from "./MatchingServiceDefault";
