export * from "./connect";
export * from "./hostport";
