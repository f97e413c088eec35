export * from "./bus";
export * from "./acquisition";
