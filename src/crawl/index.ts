export * from "./productSource";
