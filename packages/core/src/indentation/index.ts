export { IndentCache } from "./IndentCache.js";
