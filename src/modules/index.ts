/**
 * Pipeline modules export
 */

export { discover } from "./discovery";
export { runBatches } from "./runner";
export { stats } from "./stats";
