import type { RuleEngine } from '../../shared/engine/RuleEngine';
import type { ActionOutcome } from '../../shared/engine/types';
import type { PlacementChecks, PlacementRule, Position } from '../../shared/types/puzzle';
import { PLACEMENT_RULES } from '../../shared/types/puzzle';
import { isValidPosition } from '../../shared/engine/validators/utils';

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Cell Click → Engine Action Mapping
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Translates a click on a cell into a RuleEngine call and the outcome into
 * player-facing copy. Hit-testing (pixels to cells) belongs to the view;
 * this module starts from a cell position.
 */

export type ClickButton = 'primary' | 'secondary';

export interface CellClickResult {
  outcome: ActionOutcome;
  /** One line per problem; empty when the action was applied. */
  messages: string[];
}

const RULE_FEEDBACK: Record<PlacementRule, string> = {
  rowOk: 'There is another queen in the same row.',
  columnOk: 'There is another queen in the same column.',
  colorZoneOk: 'There is another queen in the same color zone.',
  cornerOk: 'There is another queen touching a corner.',
};

/**
 * Feedback lines for the rules a placement breaks, in rule order.
 */
export function describePlacementChecks(checks: PlacementChecks): string[] {
  return PLACEMENT_RULES.filter((rule) => !checks[rule]).map((rule) => RULE_FEEDBACK[rule]);
}

/**
 * Primary click places a queen, or removes the one already there.
 * Secondary click toggles a cross.
 */
export function handleCellClick(
  engine: RuleEngine,
  position: Position,
  button: ClickButton
): CellClickResult {
  const { x, y } = position;
  let outcome: ActionOutcome;

  if (button === 'secondary') {
    outcome = engine.toggleCross(x, y);
  } else if (isQueenAt(engine, position)) {
    outcome = engine.removeQueen(x, y);
  } else {
    outcome = engine.placeQueen(x, y);
  }

  if (outcome.valid) {
    return { outcome, messages: [] };
  }
  const messages = outcome.checks ? describePlacementChecks(outcome.checks) : [outcome.reason];
  return { outcome, messages };
}

function isQueenAt(engine: RuleEngine, position: Position): boolean {
  return (
    isValidPosition(position, engine.size) &&
    engine.getCellMark(position.x, position.y) === 'queen'
  );
}
