/**
 * Planning gantt data and a self-contained HTML timeline for it
 */

import { flightEndTime, type Assignment, type Target } from "../types/index.js";

export interface PlanningGanttTask {
  taskId: string;
  /** Row of the chart: the platform id */
  category: string;
  targetId: string;
  start: number;
  end: number;
  priority: number;
  threatLevel: string;
  metadata: { cycleNumber: number };
}

export interface PlanningGanttData {
  title: string;
  cycleNumber: number;
  generatedAt: number;
  categories: string[];
  timeRange: { start: number; end: number };
  tasks: PlanningGanttTask[];
}

export interface GanttSource {
  cycleNumber: number;
  assignment: Assignment;
  detectedTargets: readonly Target[];
}

/**
 * One task per assigned target; `undefined` when nothing was assigned
 */
export function buildPlanningGanttData(
  source: GanttSource,
  generatedAt: number
): PlanningGanttData | undefined {
  const targetsById = new Map(source.detectedTargets.map((t) => [t.id, t]));
  const tasks: PlanningGanttTask[] = [];

  for (const [platformId, targetIds] of source.assignment) {
    for (const targetId of targetIds) {
      const target = targetsById.get(targetId);
      if (!target) continue;
      tasks.push({
        taskId: `${platformId}_${targetId}`,
        category: platformId,
        targetId,
        start: target.launchTime,
        end: flightEndTime(target),
        priority: target.priority,
        threatLevel: target.threatLevel,
        metadata: { cycleNumber: source.cycleNumber },
      });
    }
  }

  if (tasks.length === 0) return undefined;

  return {
    title: `Planning cycle ${source.cycleNumber} - task assignment`,
    cycleNumber: source.cycleNumber,
    generatedAt,
    categories: [...new Set(tasks.map((t) => t.category))].sort(),
    timeRange: {
      start: Math.min(...tasks.map((t) => t.start)),
      end: Math.max(...tasks.map((t) => t.end)),
    },
    tasks,
  };
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const THREAT_COLORS: Record<string, string> = {
  critical: "#c0392b",
  high: "#e67e22",
  medium: "#f1c40f",
  low: "#27ae60",
};

function percent(value: number): string {
  return `${(Math.round(value * 100) / 100).toFixed(2)}%`;
}

/**
 * Static HTML page with one row per platform and one bar per task
 */
export function renderTimelineHtml(data: PlanningGanttData): string {
  const span = Math.max(1, data.timeRange.end - data.timeRange.start);

  const rows = data.categories.map((category) => {
    const bars = data.tasks
      .filter((task) => task.category === category)
      .map((task) => {
        const left = ((task.start - data.timeRange.start) / span) * 100;
        const width = Math.max(0.5, ((task.end - task.start) / span) * 100);
        const color = THREAT_COLORS[task.threatLevel] ?? "#7f8c8d";
        return (
          `<div class="bar" style="left:${percent(left)};width:${percent(width)};background:${color}"` +
          ` title="${escapeHtml(`${task.targetId} (priority ${task.priority})`)}">` +
          `${escapeHtml(task.targetId)}</div>`
        );
      });
    return (
      `<div class="row"><div class="label">${escapeHtml(category)}</div>` +
      `<div class="lane">${bars.join("")}</div></div>`
    );
  });

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(data.title)}</title>`,
    "<style>",
    "body{font-family:sans-serif;margin:24px}",
    ".row{display:flex;align-items:center;margin:4px 0}",
    ".label{width:160px;font-weight:bold}",
    ".lane{position:relative;flex:1;height:24px;background:#ecf0f1}",
    ".bar{position:absolute;top:2px;height:20px;font-size:11px;overflow:hidden;color:#fff}",
    "</style>",
    "</head>",
    "<body>",
    `<h1>${escapeHtml(data.title)}</h1>`,
    `<p>${new Date(data.timeRange.start).toISOString()} - ${new Date(data.timeRange.end).toISOString()}</p>`,
    ...rows,
    "</body>",
    "</html>",
  ].join("\n");
}
