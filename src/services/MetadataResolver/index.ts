export * from "./GpsHelper";
export * from "./MetadataResolver";
export * from "./MetadataResolverDefault";
