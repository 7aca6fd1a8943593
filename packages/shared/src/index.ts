// ─── @color-match/shared ───────────────────────────────────────────
// Pure TypeScript game engine. No framework dependencies, no I/O.
// Re-exports all public types, engine functions, and utilities.

export * from "./types/index";
export * from "./engine/index";
export * from "./deck/index";
export * from "./display/index";
