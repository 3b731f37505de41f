/**
 * CLI Utilities
 *
 * This module re-exports all utility functions for convenience.
 */

export * from "./logger.js";
export * from "./request-file.js";
export * from "./report.js";
