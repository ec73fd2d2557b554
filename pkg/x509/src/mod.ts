export * from "./certificate";
export * from "./pem";
export { extractSpki } from "./spki";
