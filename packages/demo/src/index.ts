export { countLeaves, flatten, registerExamples, tree } from "./properties.js";
export type { Tree } from "./properties.js";
