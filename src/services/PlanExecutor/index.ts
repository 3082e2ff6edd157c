export * from "./PlanExecutor";
export * from "./PlanExecutorFs";
