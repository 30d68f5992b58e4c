// src/index.ts
// wwdsl - Public API
//
// Compilers, validator, registry and project loading for tools and tests.

// ═══════════════════════════════════════════════════════════════════════════════
// TABLES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./tables";

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome/diagnostic";
export * from "./outcome/codes";

// ═══════════════════════════════════════════════════════════════════════════════
// DSL
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./dsl";

// ═══════════════════════════════════════════════════════════════════════════════
// PROJECT MODEL & REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./project";
export * from "./registry";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./compiler";
export * from "./reverse";

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATOR
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./validator";

// ═══════════════════════════════════════════════════════════════════════════════
// I/O & CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./io/jsonl";
export * from "./core/config";
