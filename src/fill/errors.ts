/**
 * Hole fill error taxonomy.
 *
 * Every failure the session can report is a value of HoleFillError, returned
 * inside a HoleFillResult. Nothing here is thrown across the session boundary.
 */

export type HoleFillErrorCode =
  | 'insufficient-edges'    // fewer than the minimum boundary edges selected
  | 'malformed-boundary'    // edges do not form one simple closed cycle
  | 'invalid-span'          // density leaves no room for the second axis
  | 'invalid-offset'        // rotation offset outside the loop
  | 'construction-failure'  // grid primitive could not be created or positioned
  | 'commit-failure'        // union or weld failed after a valid preview
  | 'discard-failure'       // preview geometry could not be removed
  | 'inactive-session';     // operation called in a phase that does not allow it

export interface HoleFillError {
  code: HoleFillErrorCode;
  message: string;
  details: {
    edgeCount?: number;
    vertexCount?: number;
    offset?: number;
    density?: number;
    spansY?: number;
    phase?: string;
    cause?: string;
    [key: string]: unknown;
  };
}

export type HoleFillResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: HoleFillError };

export const succeed = <T>(value: T): HoleFillResult<T> => ({ ok: true, value });

export const fail = <T = never>(
  code: HoleFillErrorCode,
  message: string,
  details: HoleFillError['details'] = {}
): HoleFillResult<T> => ({ ok: false, error: { code, message, details } });

/**
 * Message of an unknown thrown value, for the `cause` detail
 */
export const describeCause = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
