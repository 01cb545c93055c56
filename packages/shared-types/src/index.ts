// =============================================================================
// FakeTrace - Shared Types
// =============================================================================

export * from "./schemas.js"
export * from "./errors.js"
export * from "./identity.js"
export * from "./video.js"
export * from "./spread.js"
export * from "./alerts.js"
export * from "./calls.js"
export * from "./events.js"
