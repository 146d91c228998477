export * from "./cliArgs";
export * from "./chart";
export * from "./deskSession";
export * from "./prompts";
