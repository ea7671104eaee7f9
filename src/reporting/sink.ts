/**
 * Report sinks receive the per-cycle planning data
 */

import { REPORT_ERROR_CODES, PlanningError } from "../core/errors.js";
import { renderTimelineHtml, type PlanningGanttData } from "./gantt.js";

export type ChartFormat = "html" | "json";

export interface ReportSink {
  /** Open the session reports are grouped under; returns its location */
  createSession(name: string): Promise<string>;
  hasSession(): boolean;
  /** Store a data blob; returns where it went */
  saveData(data: unknown, label: string): Promise<string>;
  /** Render the gantt data; returns where the artifact went */
  renderChart(data: PlanningGanttData, format: ChartFormat): Promise<string>;
}

export function chartLabel(data: PlanningGanttData): string {
  return `cycle_${data.cycleNumber}_timeline`;
}

export function noSessionError(): PlanningError {
  return new PlanningError(REPORT_ERROR_CODES.NO_SESSION, "No report session has been created");
}

export class InMemoryReportSink implements ReportSink {
  readonly data = new Map<string, unknown>();
  readonly charts = new Map<string, string>();
  private session?: string;

  async createSession(name: string): Promise<string> {
    this.session = name;
    return `memory://${name}`;
  }

  hasSession(): boolean {
    return this.session !== undefined;
  }

  async saveData(data: unknown, label: string): Promise<string> {
    if (this.session === undefined) throw noSessionError();
    const location = `memory://${this.session}/${label}.json`;
    this.data.set(location, JSON.parse(JSON.stringify(data)));
    return location;
  }

  async renderChart(data: PlanningGanttData, format: ChartFormat): Promise<string> {
    if (this.session === undefined) throw noSessionError();
    const location = `memory://${this.session}/${chartLabel(data)}.${format}`;
    this.charts.set(
      location,
      format === "html" ? renderTimelineHtml(data) : JSON.stringify(data, null, 2)
    );
    return location;
  }
}
