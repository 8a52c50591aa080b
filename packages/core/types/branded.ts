/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const PackageNameBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const NormalizedUrlBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>

/**
 * A package or hammer name.
 * Guarantees: non-empty, trimmed, no path separators, colons or whitespace.
 */
export type PackageName = Brand<string, typeof PackageNameBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

/**
 * A repository locator in canonical form, see normalizeUrl.
 */
export type NormalizedUrl = Brand<string, typeof NormalizedUrlBrand>
