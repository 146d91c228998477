export * from "./createQuoteRecord";
