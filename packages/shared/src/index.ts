// Shared utilities and types for bandpilot

export const VERSION = "1.0.0";

export * from "./scoring.js";
export * from "./format.js";
