export * from "./JsonIndex";
export * from "./JsonIndexBuilderDefault";
export * from "./QuarantineSinkCollector";
