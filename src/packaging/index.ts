export * from "./packager";
