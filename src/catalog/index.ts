export * from "./assetCatalog";
