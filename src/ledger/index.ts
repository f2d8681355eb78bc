export * from "./resumeLedger";
