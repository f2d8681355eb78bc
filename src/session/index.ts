export * from "./assetFetcher";
export * from "./httpTransfer";
export * from "./sessionState";
export * from "./types";
export * from "./loadSessionModule";
