export * from "./BundleAssigner";
export * from "./BundleAssignerDefault";
