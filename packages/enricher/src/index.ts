export * from "./fetcher";
export * from "./retry";
export * from "./pacer";
export * from "./resume";
export * from "./providers/index";
export * from "./pipeline/columns";
export * from "./pipeline/enrich";
export * from "./config";
