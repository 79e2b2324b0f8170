import type { CollectionKind, NamingConvention, TypeRef } from "../model/types.js";
import { simpleName } from "../model/type-ref.js";

/** Leading character dropped from interface names when stripping is on. */
export const LEADING_MARKER = "I";

/**
 * Generated identifier for a dependency.
 *
 * "IUserService", camelCase, strip, "_"   → "_userService"
 * "IUserService", snake_case, strip, "_"  → "_user_service"
 * "IUserService", PascalCase, no strip, "" → "IUserService"
 *
 * A `rawName` that already carries `prefix` is not prefixed twice, so resolving
 * an identifier again returns it unchanged.
 */
export function resolveIdentifier(
  rawName: string,
  convention: NamingConvention,
  stripLeadingMarker: boolean,
  prefix: string,
): string {
  let name = prefix.length > 0 && rawName.startsWith(prefix) ? rawName.slice(prefix.length) : rawName;

  if (stripLeadingMarker && hasLeadingMarker(name)) {
    name = name.slice(LEADING_MARKER.length);
  }

  return prefix + applyConvention(name, convention);
}

/** Constructor parameters always render camelCase without prefix. */
export function parameterName(rawName: string, stripLeadingMarker: boolean): string {
  return resolveIdentifier(rawName, "camelCase", stripLeadingMarker, "");
}

/**
 * Parameter name for a field-level dependency.
 * "_userService" → "userService", "__cache" → "cache", "Repo" → "repo"
 */
export function fieldParameterName(fieldName: string): string {
  const bare = fieldName.replace(/^_+/, "");
  return applyConvention(bare.length > 0 ? bare : fieldName, "camelCase");
}

/**
 * Raw name a bulk dependency is named after: the simple type name without
 * generic arguments, pluralized for collections.
 * IRepository<User> → "IRepository", IPlugin[] → "IPlugins"
 */
export function rawDependencyName(target: TypeRef, collection: CollectionKind | null): string {
  const base = simpleName(target);
  return collection === null ? base : pluralize(base);
}

/**
 * English plural for identifier words.
 * "Plugin" → "Plugins", "Strategy" → "Strategies", "Box" → "Boxes"
 */
export function pluralize(word: string): string {
  if (/[^aeiou]y$/i.test(word)) return word.slice(0, -1) + "ies";
  if (/(s|x|z|ch|sh)$/i.test(word)) return word + "es";
  return word + "s";
}

function applyConvention(name: string, convention: NamingConvention): string {
  if (name.length === 0) return name;
  switch (convention) {
    case "camelCase":
      return name.charAt(0).toLowerCase() + name.slice(1);
    case "PascalCase":
      return name.charAt(0).toUpperCase() + name.slice(1);
    case "snake_case":
      return name.replace(/(?<!^)([A-Z])/g, "_$1").toLowerCase();
  }
}

/**
 * "IUserService" and "IA" carry the marker; "Index" does not, nor does "IIOStream"
 * (a doubled marker reads as part of the name). The first letter is compared
 * case-insensitively: "iOStream" would read "IOStream" after PascalCase.
 */
function hasLeadingMarker(name: string): boolean {
  if (name.length < 2 || name.charAt(0).toUpperCase() !== LEADING_MARKER || !isUpper(name.charAt(1))) return false;
  return !(name.charAt(1) === LEADING_MARKER && name.length > 2 && isUpper(name.charAt(2)));
}

function isUpper(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}
