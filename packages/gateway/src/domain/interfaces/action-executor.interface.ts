import type { Action } from '@chorus/shared';

/** Injection token of the action executor. */
export const ACTION_EXECUTOR = 'ActionExecutor';

export type ActionStatus = 'ok' | 'skipped' | 'failed';

export interface ActionOutcome {
  action: Action;
  status: ActionStatus;
  /** Why the instruction was skipped or failed. */
  detail?: string;
}

export interface ActionExecutor {
  isEnabled(): boolean;
  /** Executes each instruction independently; one failure never stops the rest. */
  execute(actions: Action[]): Promise<ActionOutcome[]>;
}
