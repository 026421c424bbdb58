export type * from "./types/events.js";
export type * from "./types/receipt.js";
export { COMMIT_RECORD_VERSION, EMPTY_TOKEN_USAGE } from "./types/receipt.js";
