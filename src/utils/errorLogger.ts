// ============================================================================
// Error Logger - Separate error trail for gateway and exhaustion failures
// ============================================================================

import * as fs from "fs";
import * as path from "path";
import { config } from "../config";

export type ErrorType =
  | "GATEWAY_INITIATION"
  | "TRANSCRIPT_FETCH"
  | "EXHAUSTION_FAILURE"
  | "CAMPAIGN_FAILED";

export interface ErrorLogEntry {
  timestamp: string;
  timestamp_ms: number;
  campaign_id: string;
  error_type: ErrorType;
  error_message: string;
  phone_number?: string;
  sheet_index?: number;
  attempt?: number;
  http_status?: number;
  context?: Record<string, unknown>;
}

export interface ErrorStats {
  total_errors: number;
  errors_by_type: Record<string, number>;
  recent_errors: ErrorLogEntry[];
}

function isErrorLogEntry(value: unknown): value is ErrorLogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "timestamp_ms" in value &&
    typeof value.timestamp_ms === "number" &&
    "error_type" in value &&
    typeof value.error_type === "string"
  );
}

class ErrorLoggerClass {
  private errorLogFile: string;
  private errorBuffer: ErrorLogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private readonly BUFFER_SIZE = 100; // Flush after 100 errors
  private readonly FLUSH_INTERVAL_MS = 5000; // Or flush every 5 seconds

  constructor(private readonly enabled: boolean, logDir: string) {
    this.errorLogFile = path.join(logDir, "errors.log");
    if (this.enabled) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.flushInterval = setInterval(() => this.flush(), this.FLUSH_INTERVAL_MS);
      this.flushInterval.unref();
    }
  }

  logError(
    campaignId: string,
    errorType: ErrorType,
    errorMessage: string,
    options?: {
      phoneNumber?: string;
      sheetIndex?: number;
      attempt?: number;
      httpStatus?: number;
      context?: Record<string, unknown>;
    }
  ): void {
    if (!this.enabled) return;

    this.errorBuffer.push({
      timestamp: new Date().toISOString(),
      timestamp_ms: Date.now(),
      campaign_id: campaignId,
      error_type: errorType,
      error_message: errorMessage,
      phone_number: options?.phoneNumber,
      sheet_index: options?.sheetIndex,
      attempt: options?.attempt,
      http_status: options?.httpStatus,
      context: options?.context,
    });

    if (this.errorBuffer.length >= this.BUFFER_SIZE) {
      this.flush();
    }
  }

  private flush(): void {
    if (this.errorBuffer.length === 0) {
      return;
    }

    const errors = [...this.errorBuffer];
    this.errorBuffer = [];

    try {
      const logLines = errors.map((entry) => JSON.stringify(entry)).join("\n");
      fs.appendFileSync(this.errorLogFile, logLines + "\n");
    } catch (err) {
      console.error("Failed to write error log:", err);
    }
  }

  /**
   * Error counts within the last `timeWindowMs`
   */
  getErrorStats(timeWindowMs: number = 60000): ErrorStats {
    const empty: ErrorStats = { total_errors: 0, errors_by_type: {}, recent_errors: [] };
    if (!this.enabled) return empty;

    this.flush();
    if (!fs.existsSync(this.errorLogFile)) return empty;

    const cutoff = Date.now() - timeWindowMs;
    const recentErrors: ErrorLogEntry[] = [];
    const errorsByType: Record<string, number> = {};

    try {
      const lines = fs
        .readFileSync(this.errorLogFile, "utf-8")
        .trim()
        .split("\n")
        .filter(Boolean);

      for (const line of lines) {
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch {
          continue; // partial line from an interrupted write
        }
        if (!isErrorLogEntry(parsed) || parsed.timestamp_ms < cutoff) continue;

        recentErrors.push(parsed);
        errorsByType[parsed.error_type] = (errorsByType[parsed.error_type] || 0) + 1;
      }
    } catch (err) {
      console.error("Failed to read error stats:", err);
      return empty;
    }

    return {
      total_errors: recentErrors.length,
      errors_by_type: errorsByType,
      recent_errors: recentErrors.slice(-50), // Last 50 errors
    };
  }

  shutdown(): void {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    this.flush();
  }
}

export const errorLogger = new ErrorLoggerClass(
  config.errorLog.enabled,
  path.resolve(process.cwd(), config.errorLog.dir)
);
