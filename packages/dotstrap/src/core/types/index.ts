/**
 * Core Types Module
 *
 * Re-exports branded types, coercion functions and the error model.
 */

export * from "./branded.js"
export * from "./coerce.js"
export * from "./errors.js"
