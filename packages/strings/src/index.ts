/**
 * @utilkit/strings — String helpers
 */

export { toUpperCaseFirst } from "./case.js";
