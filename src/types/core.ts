/**
 * Result type shared by every multikube component.
 *
 * Failures scoped to one cluster or one profile/region pair are logged and
 * absorbed where they happen. Failures that end the run travel up as
 * `ok: false` until the CLI prints them and exits with status 1.
 */

/**
 * What went wrong and what the operator can do about it
 */
export interface ErrorGuidance {
  message: string;
  /** The problem in operator terms */
  hint?: string;
  /** Command or change that fixes it */
  resolution?: string;
  /** Structured context; fatal failures carry `code`, identity failures `reason` */
  details?: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const targets = resolveTargets(inventory, 'prod-');
 * if (!targets.ok) {
 *   console.error(targets.error, targets.guidance?.resolution);
 *   return targets;
 * }
 * for (const { clusterName } of targets.value) console.log(clusterName);
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Failed result. The guidance is copied and its `message` defaults to `error`.
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  if (!guidance) {
    return { ok: false, error };
  }
  return { ok: false, error, guidance: { ...guidance, message: guidance.message || error } };
};
