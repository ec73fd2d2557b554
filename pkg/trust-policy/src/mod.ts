export * from "./bundle";
export * from "./chain-validator";
export * from "./errors";
export * from "./evaluate";
export * from "./node-chain-validator";
export * from "./pinned-set";
export * from "./pinning-mode";
export * from "./security-policy";
export * from "./server-trust";
