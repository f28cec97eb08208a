export const ACTION_STATUSES = [
  'success',
  'error',
  'missing_slots',
  'not_found',
  'unimplemented',
] as const;

export type ActionStatus = (typeof ACTION_STATUSES)[number];

/**
 * Outcome of executing an intent.
 * Slot and date problems are reported here rather than thrown.
 */
export interface ActionResult {
  status: ActionStatus;

  /** User-facing text, already phrased for the reply */
  message: string;

  data: Record<string, unknown>;
}

export function actionResult(
  status: ActionStatus,
  message: string,
  data: Record<string, unknown> = {},
): ActionResult {
  return { status, message, data };
}
