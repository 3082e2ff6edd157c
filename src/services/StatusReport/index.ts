export * from "./StatusReport";
export * from "./StatusReportFs";
