export * from "./quoteFile";
