/**
 * @module statistics
 * Counts over the current history, derived on demand.
 */

import type { CommandHistory, CommandKind, HistoryStatistics } from '@trip-planner/types';

export function computeStatistics(history: CommandHistory): HistoryStatistics {
  const byKind: Partial<Record<CommandKind, number>> = {};
  let executed = 0;
  let undone = 0;
  let failed = 0;

  const entries = history.entries();
  for (const command of entries) {
    byKind[command.kind] = (byKind[command.kind] ?? 0) + 1;
    if (command.status === 'executed') executed++;
    else if (command.status === 'undone') undone++;
    else if (command.status === 'failed') failed++;
  }

  return {
    total: entries.length,
    executed,
    undone,
    failed,
    byKind,
    cursor: history.cursor,
    maxSize: history.maxSize,
    canUndo: history.canUndo,
    canRedo: history.canRedo,
  };
}
