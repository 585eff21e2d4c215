export * from "./client";
export * from "./row-sink";
