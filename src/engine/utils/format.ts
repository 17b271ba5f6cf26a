/** Display helpers for the prediction panel. */

export function formatPassProbability(score: number | null): string {
  return score === null ? 'Pass Probability: -' : `Pass Probability: ${score.toFixed(1)}%`;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Local time as "Last update: YYYY-MM-DD HH:MM:SS". */
export function formatLastUpdate(date: Date | null): string {
  if (!date) return 'Last update: Never';
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `Last update: ${day} ${time}`;
}

/** "Pending changes: teaching, materials" or "No pending changes". */
export function formatPendingChanges(names: readonly string[]): string {
  return names.length > 0 ? `Pending changes: ${names.join(', ')}` : 'No pending changes';
}
