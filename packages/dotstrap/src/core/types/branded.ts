/**
 * Branded Types for dotstrap
 *
 * Structural strings tagged with a brand symbol so that a validated value
 * cannot be confused with a raw one. Only the coercion functions in
 * ./coerce.ts and the path resolver create branded values.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const EntryKeyBrand: unique symbol

/**
 * A non-empty, trimmed string.
 */
export type NonEmptyString = string & { readonly [NonEmptyStringBrand]: true }

/**
 * An absolute filesystem path.
 * Guarantees: starts with /, normalized (no . or ..)
 */
export type AbsolutePath = string & { readonly [AbsolutePathBrand]: true }

/**
 * A manifest entry key: the entry's source path relative to the repository root.
 */
export type EntryKey = string & { readonly [EntryKeyBrand]: true }
