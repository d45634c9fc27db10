/**
 * RenderDebugLogger - Logging for render runs
 *
 * Disabled by default. When enabled (CLI --verbose), each render records a
 * log entry and prints progress to the console. Skipped-shape warnings are
 * printed regardless, since they change what the image contains.
 */

import type { Shape } from "@/shapes/Shape";

/**
 * Debug log entry for a single render.
 */
export interface RenderDebugLog {
  startedAt: number;
  width: number;
  height: number;
  objectCount: number;
  hasLight: boolean;
  rowsCompleted: number;
  finishedAt?: number;
  durationMs?: number;
}

export interface RenderStartInfo {
  width: number;
  height: number;
  objectCount: number;
  hasLight: boolean;
}

/**
 * Global debug logger instance.
 */
class RenderDebugLoggerImpl {
  private enabled = false;
  private logs: RenderDebugLog[] = [];
  private maxLogs = 20;
  private lastLog: RenderDebugLog | null = null;
  /** Progress is printed every this many percent */
  private progressStepPercent = 10;
  private lastReportedPercent = 0;
  /** Shapes already warned about; each instance is reported once */
  private warnedShapes = new WeakSet<Shape>();

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[RENDER DEBUG] Logging enabled.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[RENDER DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new log entry for a render.
   */
  logRenderStart(info: RenderStartInfo): void {
    if (!this.enabled) return;

    const log: RenderDebugLog = {
      startedAt: Date.now(),
      width: info.width,
      height: info.height,
      objectCount: info.objectCount,
      hasLight: info.hasLight,
      rowsCompleted: 0,
    };

    this.lastLog = log;
    this.lastReportedPercent = 0;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `[RENDER DEBUG] Rendering ${info.width}x${info.height}, ${info.objectCount} object(s), ${info.hasLight ? "1 light" : "no light"}`
    );
  }

  /**
   * Record a finished row; prints progress at each step.
   */
  logRowComplete(rowsCompleted: number, totalRows: number): void {
    if (!this.enabled || !this.lastLog) return;

    this.lastLog.rowsCompleted = rowsCompleted;

    const percent = Math.floor((rowsCompleted / totalRows) * 100);
    if (percent - this.lastReportedPercent >= this.progressStepPercent) {
      this.lastReportedPercent = percent;
      console.log(`[RENDER DEBUG] ${percent}% (${rowsCompleted}/${totalRows} rows)`);
    }
  }

  logRenderEnd(): void {
    if (!this.enabled || !this.lastLog) return;

    const finishedAt = Date.now();
    this.lastLog.finishedAt = finishedAt;
    this.lastLog.durationMs = finishedAt - this.lastLog.startedAt;

    console.log(`[RENDER DEBUG] Finished in ${this.lastLog.durationMs}ms`);
  }

  /**
   * Warn that a shape will not be rendered. Printed once per shape instance,
   * so two shapes sharing an id are both reported.
   */
  warnSkippedShape(shape: Shape, reason: string): void {
    if (this.warnedShapes.has(shape)) return;
    this.warnedShapes.add(shape);
    console.warn(`[RENDER] Skipping ${shape.shapeType} "${shape.id}": ${reason}`);
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[RENDER DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);
    for (const log of this.logs) {
      console.group(`Render @ ${new Date(log.startedAt).toISOString()}`);
      console.log("Size:", `${log.width}x${log.height}`);
      console.log("Objects:", log.objectCount);
      console.log("Light:", log.hasLight);
      console.log("Rows completed:", log.rowsCompleted);
      if (log.durationMs !== undefined) {
        console.log("Duration (ms):", log.durationMs);
      }
      console.groupEnd();
    }
  }

  getLastLog(): RenderDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly RenderDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs and forget which shapes were warned about.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
    this.warnedShapes = new WeakSet<Shape>();
  }
}

export const RenderDebugLogger = new RenderDebugLoggerImpl();
