import { InvalidStyleError } from './errors.js';
import type { LoadingMode } from './loading-mode.js';

/**
 * Turn untrusted configuration (parsed JSON, data attributes) into a
 * complete style for `mode`. Missing fields take the mode's defaults.
 *
 * @throws {InvalidStyleError} listing every field that failed validation
 *
 * @example
 * ```typescript
 * const view = new LoadingView(DotsMode, {
 *   style: resolveStyle(DotsMode, JSON.parse(raw)),
 * });
 * ```
 */
export function resolveStyle<TStyle extends object>(mode: LoadingMode<TStyle>, input: unknown = {}): TStyle {
  const result = mode.styleSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidStyleError(
      mode.name,
      result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    );
  }
  return result.data;
}
