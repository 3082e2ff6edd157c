export * from "./CandidateGenerator";
export * from "./CandidateGeneratorDefault";
export * from "./CandidateRules";
