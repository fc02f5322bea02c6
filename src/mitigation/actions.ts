import { ACTION_NAMES, type ActionName, type RiskTier } from '../types.js';

export type ActionTarget = {
  packageName: string;
  anomalyScore: number;
  riskLevel: RiskTier;
  detectedAt: string;
};

export type RollbackAction = { kind: 'rollback'; target: ActionTarget };
export type ValidateAction = { kind: 'validate'; target: ActionTarget };
export type BlockUpdatesAction = { kind: 'block_updates'; target: ActionTarget };
export type NotifyAction = { kind: 'notify'; target: ActionTarget };
export type UnrecognizedAction = { kind: 'unrecognized'; name: string };

export type KnownAction = RollbackAction | ValidateAction | BlockUpdatesAction | NotifyAction;

export type Action = KnownAction | UnrecognizedAction;

export type ActionResult = {
  ok: boolean;
  reason?: string;
};

/** One method per action kind. Implementations report failure rather than throw where they can. */
export interface ActionExecutor {
  rollback(action: RollbackAction): Promise<ActionResult>;
  validate(action: ValidateAction): Promise<ActionResult>;
  blockUpdates(action: BlockUpdatesAction): Promise<ActionResult>;
  notify(action: NotifyAction): Promise<ActionResult>;
}

export function isActionName(name: string): name is ActionName {
  return ACTION_NAMES.some(action => action === name);
}

export function parseAction(name: string, target: ActionTarget): Action {
  const normalized = name.trim().toLowerCase();
  if (!isActionName(normalized)) {
    return { kind: 'unrecognized', name };
  }
  return { kind: normalized, target };
}

/**
 * Preserves configured order. A name listed twice yields one action: nothing
 * runs more than once per detection event.
 */
export function parseActionPlan(names: readonly string[], target: ActionTarget): Action[] {
  const seen = new Set<ActionName>();
  const plan: Action[] = [];
  for (const name of names) {
    const action = parseAction(name, target);
    if (action.kind !== 'unrecognized') {
      if (seen.has(action.kind)) {
        continue;
      }
      seen.add(action.kind);
    }
    plan.push(action);
  }
  return plan;
}

export function dispatchAction(executor: ActionExecutor, action: KnownAction): Promise<ActionResult> {
  switch (action.kind) {
    case 'rollback':
      return executor.rollback(action);
    case 'validate':
      return executor.validate(action);
    case 'block_updates':
      return executor.blockUpdates(action);
    case 'notify':
      return executor.notify(action);
    default: {
      const unreachable: never = action;
      throw new Error(`Unhandled action ${JSON.stringify(unreachable)}`);
    }
  }
}
