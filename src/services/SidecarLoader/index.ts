export * from "./SidecarLoader";
export * from "./SidecarLoaderFs";
