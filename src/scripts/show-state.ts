import { Database } from '../services/database.js';
import { formatMoney } from '../utils/embed.js';
import type { MonitorState } from '../types.js';

const DB_PATH = process.env['DB_PATH'] ?? './data/monitor.db';
const HISTORY_LIMIT = 5;

function formatState(state: MonitorState): string {
  const price = state.lastKnown
    ? `${formatMoney(state.lastKnown.price, state.lastKnown.currency)} at ${state.lastKnown.timestamp}`
    : 'no price yet';
  const failures = state.consecutiveFailures > 0
    ? ` (${state.consecutiveFailures} failures, last: ${state.lastErrorKind ?? 'unknown'})`
    : '';
  const range = state.inTargetRange ? ' [in target range]' : '';
  return `${state.itemId}: ${price}${range} | last check ${state.lastCheckAt} ${state.lastOutcome}${failures}`;
}

function showState(): void {
  const db = new Database(DB_PATH);

  try {
    const states = db.loadAll();
    if (states.length === 0) {
      console.log(`No items recorded in ${DB_PATH}`);
      return;
    }

    for (const state of states) {
      console.log(formatState(state));
      for (const sample of db.getHistory(state.itemId, HISTORY_LIMIT)) {
        const retailer = sample.source.retailer ? ` (${sample.source.retailer})` : '';
        console.log(`    ${sample.timestamp}  ${formatMoney(sample.price, sample.currency)}${retailer}`);
      }
    }
  } finally {
    db.close();
  }
}

showState();
