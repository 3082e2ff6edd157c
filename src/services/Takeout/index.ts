export * from "./ExtensionHelper";
export * from "./MediaFile";
export * from "./SidecarNameHelper";
export * from "./SuffixHelper";
export * from "./TakeoutRecord";
export * from "./TakeoutRecordParser";
