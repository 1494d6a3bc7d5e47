// ─── @tally/engine ─────────────────────────────────────────────────
// Arbitrary-precision expression engine. No runtime dependencies.
// Re-exports the numeric tower, parser, evaluator and formatting.

export * from "./numeric/index";
export * from "./engine/index";
export * from "./format/index";
