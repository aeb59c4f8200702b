import type { ScoreStore, SummaryEntry } from "./types.js";

/**
 * In-memory score log. Appends and drains run synchronously on the event loop, so a
 * drain swaps the whole map out before any concurrent append can interleave: an entry
 * lands either in the drained batch or in the next period, never in neither.
 */
export class ScoreLog implements ScoreStore {
  private entries = new Map<string, SummaryEntry[]>();

  append(entry: SummaryEntry): void {
    const list = this.entries.get(entry.userId);
    if (list) {
      list.push(entry);
    } else {
      this.entries.set(entry.userId, [entry]);
    }
  }

  drain(): Map<string, SummaryEntry[]> {
    const drained = this.entries;
    this.entries = new Map();
    return drained;
  }

  get size(): number {
    let total = 0;
    for (const list of this.entries.values()) total += list.length;
    return total;
  }
}
