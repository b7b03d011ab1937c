/**
 * Domain layer - pure business logic.
 *
 * This module contains pure functions and types that:
 * - Have no side effects
 * - Don't depend on logging, metrics or the clock
 * - Are fully unit-testable
 * - Can be tested in isolation without mocking
 */

// Time helpers and clock abstraction
export * from "./utils/index.js";

// Circuit breaker state machine
export * from "./circuit-breaker/index.js";

// SLI math and SLO catalogue
export * from "./slo/index.js";
