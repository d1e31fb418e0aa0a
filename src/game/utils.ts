/**
 * Gets the compiler to ensure that a value being switched on has had all its
 * possible values handled, so that adding a new enum member or union variant
 * breaks the build until every switch covers it.
 * @param value The value being exhaustively switched on.
 */
export function ensureExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled case: ${JSON.stringify(value)}`);
}
