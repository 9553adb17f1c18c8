export * from "./sqlite/schema";
export * from "./sqlite/builder";
export * from "./normalize/fields";
export * from "./genres/parser";
export * from "./pipeline/import";
export * from "./config";
