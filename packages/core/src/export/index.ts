export { toResultRows, toDelimited } from "./table.js";
export type { ResultRow, DelimitedOptions } from "./table.js";
