/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { copyAssets } from "./assets";
export { parse } from "./parser";
export { assemble } from "./assembler";
export { render } from "./renderer";
export { stats } from "./stats";
