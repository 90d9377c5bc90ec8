import * as fs from "fs";
import * as path from "path";

/**
 * Formats a local date as YYYYMMDD_HHMMSS for log file names
 */
export function formatLogStamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Session logging with file persistence.
 * A new log file is created for every run of the batch.
 */
class SessionLogger {
  private debugEnabled: boolean = false;
  private logFile: string | null = null;

  /**
   * Create the log file for this session inside logDirectory
   */
  initialize(logDirectory: string, now: Date = new Date()): string | null {
    try {
      if (!fs.existsSync(logDirectory)) {
        fs.mkdirSync(logDirectory, { recursive: true });
      }

      this.logFile = path.join(logDirectory, `hevc-batch_${formatLogStamp(now)}.log`);

      const header = `${"=".repeat(60)}\n` +
        `hevc-batch - Started: ${now.toISOString()}\n` +
        `Platform: ${process.platform} ${process.arch}, Node ${process.version}\n` +
        `${"=".repeat(60)}\n`;

      fs.writeFileSync(this.logFile, header, "utf8");
    } catch (error) {
      // Console is the only sink left at this point
      console.error(`[SessionLogger] Failed to initialize: ${error}`);
      this.logFile = null;
    }
    return this.logFile;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /**
   * Log an operator-facing message (console and file)
   */
  log(message: string): void {
    console.log(message);
    this.append(message);
  }

  warn(message: string): void {
    console.warn(message);
    this.append(`[WARN] ${message}`);
  }

  error(message: string, data?: unknown): void {
    console.error(message);
    this.append(`[ERROR] ${message}`, data);
  }

  /**
   * Log a diagnostic message.
   * Only written when debug logging is enabled.
   */
  debug(category: string, message: string, data?: unknown): void {
    if (!this.debugEnabled) return;

    const line = `[${category}] ${message}`;
    console.log(line);
    this.append(line, data);
  }

  logCommand(args: readonly string[]): void {
    this.debug("COMMAND", args.join(" "), { args });
  }

  logEncoderOutput(output: string): void {
    const trimmed = output.trim();
    if (trimmed) {
      this.debug("FFMPEG", trimmed);
    }
  }

  private append(message: string, data?: unknown): void {
    if (!this.logFile) return;

    const flat = message.replace(/\r/g, "").replace(/\n/g, " ");
    let content = `[${new Date().toISOString()}] ${flat}\n`;
    if (data !== undefined) {
      content += `${JSON.stringify(data, null, 2)}\n`;
    }

    try {
      fs.appendFileSync(this.logFile, content, "utf8");
    } catch {
      // Log file writes are best-effort
    }
  }
}

// Singleton instance
export const sessionLogger = new SessionLogger();
