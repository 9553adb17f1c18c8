export * from "./types/anime";
export * from "./constants/columns";
export * from "./utils/text";
export * from "./utils/csv";
