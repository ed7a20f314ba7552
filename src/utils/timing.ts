import Table from "cli-table3";

import type { SyncResult } from "../types";

export interface PhaseResult {
  name: string;
  duration: number;
  count?: number;
}

export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = Date.now();
  }

  stop(): number {
    this.endTime = Date.now();
    return this.getDuration();
  }

  getDuration(): number {
    const end = this.endTime ?? Date.now();
    return end - this.startTime;
  }
}

/** Sequential phases: starting one ends the previous. */
export class PhaseTimer {
  private phases: Map<string, { timer: Timer; count?: number }> = new Map();
  private currentPhase?: string;

  startPhase(name: string): void {
    if (this.currentPhase) {
      this.endPhase();
    }
    this.currentPhase = name;
    this.phases.set(name, { timer: new Timer() });
  }

  endPhase(): void {
    if (this.currentPhase) {
      this.phases.get(this.currentPhase)?.timer.stop();
      this.currentPhase = undefined;
    }
  }

  setPhaseCount(name: string, count: number): void {
    const phase = this.phases.get(name);
    if (phase) {
      phase.count = count;
    }
  }

  getResults(): PhaseResult[] {
    if (this.currentPhase) {
      this.endPhase();
    }

    return [...this.phases.entries()].map(([name, { timer, count }]) => ({
      name,
      duration: timer.getDuration(),
      count,
    }));
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatSummaryTable(result: SyncResult, totalDuration: number, phases: PhaseResult[]): string {
  const table = new Table({
    head: ["Step", "Commits", "Duration"],
    colWidths: [30, 10, 12],
    style: {
      head: ["cyan", "bold"],
      border: ["gray"],
    },
  });

  table.push([{ colSpan: 3, content: `Sync Summary (${result.status})`, hAlign: "center" }]);

  for (let i = 0; i < phases.length; i++) {
    const phase = phases[i];
    const prefix = i === phases.length - 1 ? "└─" : "├─";
    table.push([
      `  ${prefix} ${phase.name}`,
      phase.count === undefined ? "" : String(phase.count),
      formatDuration(phase.duration),
    ]);
  }

  table.push(["Already synced", String(result.alreadySynced), ""]);
  table.push(["Total", "", formatDuration(totalDuration)]);

  return table.toString();
}
