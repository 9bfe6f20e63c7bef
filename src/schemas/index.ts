export * from "./config";
export * from "./mpv";
export * from "./validate";
export * from "./youtube";
