/**
 * File-system report sink. Each session is a directory under the output
 * root; data is written as pretty JSON, charts as JSON or HTML.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { REPORT_ERROR_CODES, PlanningError, toErrorMessage } from "../core/errors.js";
import { renderTimelineHtml, type PlanningGanttData } from "./gantt.js";
import { chartLabel, noSessionError, type ChartFormat, type ReportSink } from "./sink.js";

function safeName(name: string): string {
  return name.replace(/[^\w.-]+/g, "_");
}

export class FileReportSink implements ReportSink {
  private sessionDir?: string;

  constructor(private readonly outputDir: string) {}

  async createSession(name: string): Promise<string> {
    const dir = join(this.outputDir, safeName(name));
    await this.write(() => mkdir(dir, { recursive: true }), dir);
    this.sessionDir = dir;
    return dir;
  }

  hasSession(): boolean {
    return this.sessionDir !== undefined;
  }

  async saveData(data: unknown, label: string): Promise<string> {
    if (this.sessionDir === undefined) throw noSessionError();
    const path = join(this.sessionDir, `${safeName(label)}.json`);
    await this.write(() => writeFile(path, JSON.stringify(data, null, 2), "utf8"), path);
    return path;
  }

  async renderChart(data: PlanningGanttData, format: ChartFormat): Promise<string> {
    if (this.sessionDir === undefined) throw noSessionError();
    const path = join(this.sessionDir, `${chartLabel(data)}.${format}`);
    const content = format === "html" ? renderTimelineHtml(data) : JSON.stringify(data, null, 2);
    await this.write(() => writeFile(path, content, "utf8"), path);
    return path;
  }

  private async write(action: () => Promise<unknown>, path: string): Promise<void> {
    try {
      await action();
    } catch (error) {
      throw new PlanningError(
        REPORT_ERROR_CODES.WRITE_FAILED,
        `Could not write ${path}: ${toErrorMessage(error)}`,
        { cause: error, recoverable: true }
      );
    }
  }
}
