/**
 * Finite state machine for a load run.
 *
 * Valid transitions:
 * - `INITIALIZED` → `WRITING`
 * - `WRITING` → `VERIFYING` | `FAILED`
 * - `VERIFYING` → `ANALYZING`
 * - `ANALYZING` → `COMPLETED` | `FAILED`
 * - `COMPLETED`, `FAILED` → (terminal)
 */
export const LoadStatus = {
  INITIALIZED: 'INITIALIZED',
  WRITING: 'WRITING',
  VERIFYING: 'VERIFYING',
  ANALYZING: 'ANALYZING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type LoadStatus = (typeof LoadStatus)[keyof typeof LoadStatus];

const VALID_TRANSITIONS: Record<LoadStatus, readonly LoadStatus[]> = {
  [LoadStatus.INITIALIZED]: [LoadStatus.WRITING],
  [LoadStatus.WRITING]: [LoadStatus.VERIFYING, LoadStatus.FAILED],
  [LoadStatus.VERIFYING]: [LoadStatus.ANALYZING],
  [LoadStatus.ANALYZING]: [LoadStatus.COMPLETED, LoadStatus.FAILED],
  [LoadStatus.COMPLETED]: [],
  [LoadStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the load lifecycle FSM. */
export function canTransition(from: LoadStatus, to: LoadStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` for `COMPLETED` and `FAILED`. */
export function isTerminal(status: LoadStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export function isLoadStatus(value: unknown): value is LoadStatus {
  return typeof value === 'string' && value in VALID_TRANSITIONS;
}
