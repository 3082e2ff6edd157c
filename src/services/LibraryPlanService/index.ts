export * from "./LibraryPlanService";
export * from "./LibraryPlanServiceDefault";
