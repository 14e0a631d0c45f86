/**
 * Exhaustive type checking helper.
 * Ensures all cases of a discriminated union are handled.
 *
 * Usage:
 * ```typescript
 * switch (path.kind) {
 *   case 'arc': return drawArc(path);
 *   case 'roundedRect': return drawRect(path);
 *   default: return assertNever(path);
 * }
 * ```
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled discriminated union member: ${JSON.stringify(value)}`);
}
