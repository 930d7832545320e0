// ─── @war-audit/shared ─────────────────────────────────────────────
// Pure TypeScript transcript engine. No I/O, no framework dependencies.
// Re-exports all public types, engine classes, and card helpers.

export * from "./types/index";
export * from "./engine/index";
export * from "./deck/index";
export * from "./schema/index";
