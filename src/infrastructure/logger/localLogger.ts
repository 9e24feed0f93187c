import { promises as fs } from "fs";
import path from "path";
import type { LoggerPort } from "../../interfaces/ports";

type LogLevel = "info" | "warn" | "error";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  runId: string;
  message: string;
  pid: number;
};

export class LocalLogger implements LoggerPort {
  constructor(
    private baseDir: string,
    private mirrorToConsole = process.env.LOG_TO_CONSOLE !== "false"
  ) {}

  async info(runId: string, message: string) {
    await this.append(runId, "info", message);
  }

  async warn(runId: string, message: string) {
    await this.append(runId, "warn", message);
  }

  async error(runId: string, message: string) {
    await this.append(runId, "error", message);
  }

  logPath(runId: string) {
    return path.join(this.baseDir, `${runId}.log`);
  }

  private async append(runId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId,
      message,
      pid: process.pid
    };
    if (this.mirrorToConsole && level !== "info") {
      console[level](`[${runId}] ${message}`);
    }

    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(this.logPath(runId), `${JSON.stringify(entry)}\n`);
    } catch (error) {
      console.error("Logger write failed", error);
    }
  }
}
