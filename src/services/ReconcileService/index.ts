export * from "./ReconcileService";
export * from "./ReconcileServiceDefault";
