/**
 * Finite state machine for one pipeline run.
 *
 * Valid transitions:
 * - `CREATED` → `VALIDATING` | `CANCELLED`
 * - `VALIDATING` → `INVALID` | `TRANSFORMING`
 * - `TRANSFORMING` → `SUBMITTING` | `FAILED` | `CANCELLED`
 * - `SUBMITTING` → `SUCCEEDED` | `INVALID` | `FAILED` | `CANCELLED`
 * - `INVALID`, `SUCCEEDED`, `FAILED`, `CANCELLED` → (terminal)
 */
export const SubmissionStatus = {
  CREATED: 'CREATED',
  VALIDATING: 'VALIDATING',
  INVALID: 'INVALID',
  TRANSFORMING: 'TRANSFORMING',
  SUBMITTING: 'SUBMITTING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type SubmissionStatus = (typeof SubmissionStatus)[keyof typeof SubmissionStatus];

const VALID_TRANSITIONS: Record<SubmissionStatus, readonly SubmissionStatus[]> = {
  [SubmissionStatus.CREATED]: [SubmissionStatus.VALIDATING, SubmissionStatus.CANCELLED],
  [SubmissionStatus.VALIDATING]: [SubmissionStatus.INVALID, SubmissionStatus.TRANSFORMING],
  [SubmissionStatus.TRANSFORMING]: [SubmissionStatus.SUBMITTING, SubmissionStatus.FAILED, SubmissionStatus.CANCELLED],
  [SubmissionStatus.SUBMITTING]: [
    SubmissionStatus.SUCCEEDED,
    SubmissionStatus.INVALID,
    SubmissionStatus.FAILED,
    SubmissionStatus.CANCELLED,
  ],
  [SubmissionStatus.INVALID]: [],
  [SubmissionStatus.SUCCEEDED]: [],
  [SubmissionStatus.FAILED]: [],
  [SubmissionStatus.CANCELLED]: [],
};

/** Check whether a transition is valid according to the submission lifecycle FSM. */
export function canTransition(from: SubmissionStatus, to: SubmissionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Whether no further transition is possible. */
export function isTerminal(status: SubmissionStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
