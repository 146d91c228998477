export * from "./oauthSigner";
export * from "./quoteMapper";
export * from "./etradeClient";
