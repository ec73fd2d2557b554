import assert from "tiny-invariant";

export { assert };
export { console, sha256, timingSafeEqual } from "./platform_node";

export * from "./byte-set";
export * from "./number";
export * from "./string";
