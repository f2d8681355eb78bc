export * from "./artifactValidator";
