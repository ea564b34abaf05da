import { v4 as uuidv4 } from "uuid";
import type { ChartCollection } from "./charts.js";
import type { ReportDetails } from "./types.js";

export type ReportBundle = {
  report_id: string;
  details: ReportDetails;
  charts: ChartCollection;
  html: string;
};

/**
 * Holds the most recent report bundles in memory. Eviction follows insertion
 * order; reading a bundle does not extend its life.
 */
export class ReportCache {
  private readonly bundles = new Map<string, ReportBundle>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`report cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  put(bundle: Omit<ReportBundle, "report_id">): ReportBundle {
    const stored: ReportBundle = { report_id: newReportId(), ...bundle };
    this.bundles.set(stored.report_id, stored);
    while (this.bundles.size > this.capacity) {
      const oldest = this.bundles.keys().next();
      if (oldest.done) break;
      this.bundles.delete(oldest.value);
    }
    return stored;
  }

  get(reportId: string): ReportBundle | null {
    return this.bundles.get(reportId) ?? null;
  }

  get size(): number {
    return this.bundles.size;
  }

  ids(): string[] {
    return [...this.bundles.keys()];
  }
}

function newReportId(): string {
  return uuidv4().replace(/-/g, "");
}
