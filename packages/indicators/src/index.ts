export * from "./rolling";
export * from "./ichimoku";
