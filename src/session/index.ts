/**
 * Session Module - Session intervals and wall-clock accounting
 */

export * from "./IntervalMerger.js";
export * from "./SessionIndex.js";
export * from "./sessionStats.js";
