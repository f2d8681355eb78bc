export * from "./outputAuditor";
