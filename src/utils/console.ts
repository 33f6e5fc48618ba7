import chalk from "chalk";
import { appendFileSync, writeFileSync } from "node:fs";

let logFilePath: string | null = null;

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

function consoleLogExceptInTestEnv(message: string): void {
  if (!isTestEnv()) {
    console.log(message);
  }
}

// Starts a fresh log file (truncating any previous one); null disables file logging.
export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
  if (logFilePath) {
    writeFileSync(logFilePath, "", "utf-8");
  }
}

export function formatLogLine(level: string, message: string, timestamp: Date = new Date()): string {
  return `[${timestamp.toISOString()}] [${level}] ${message}\n`;
}

function writeToLog(level: string, message: string): void {
  if (!logFilePath) {
    return;
  }
  appendFileSync(logFilePath, formatLogLine(level, message), "utf-8");
}

export function success(message: string): void {
  consoleLogExceptInTestEnv(chalk.green(message));
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  consoleLogExceptInTestEnv(chalk.red(message));
  writeToLog("ERROR", message);
}

export function warning(message: string): void {
  consoleLogExceptInTestEnv(chalk.bgHex(`#FFA500`).black(`WARNING: ${message}`));
  writeToLog("WARNING", message);
}

export function info(message: string): void {
  consoleLogExceptInTestEnv(chalk.blue(message));
  writeToLog("INFO", message);
}

export function bold(message: string): void {
  consoleLogExceptInTestEnv(chalk.bold(message));
  writeToLog("INFO", message);
}

export function h1(message: string): void {
  consoleLogExceptInTestEnv(chalk.cyanBright(message));
  writeToLog("INFO", message);
}
