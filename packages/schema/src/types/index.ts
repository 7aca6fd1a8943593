export * from "./card";
export * from "./state";
export * from "./config";
