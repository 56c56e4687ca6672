/**
 * rtdb-rest - Realtime Database REST API Client
 *
 * A lightweight TypeScript library for Realtime Database reads, writes and
 * change streams over the REST API.
 */

// Main client
export * from "./client.js";
export * from "./references.js";

// Transport
export * from "./executor.js";
export * from "./transport.js";
export * from "./url.js";

// Change streams
export * from "./event-stream.js";
export * from "./listeners.js";
export * from "./watch.js";

// Errors and logging
export * from "./errors.js";
export * from "./logger.js";

// Types
export * from "./types.js";
