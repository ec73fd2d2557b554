export { COMMAND, makeParser } from "./parser";
