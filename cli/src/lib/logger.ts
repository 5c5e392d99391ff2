import fs from "node:fs";
import path from "node:path";
import type { SyncEvent } from "../types/index.js";

const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function logFileName(name: string, date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${name}-${day}_${time}.log`;
}

let capturing = false;
let captured: string[] = [];
let logFile: string | null = null;

function toFile(text: string) {
  if (!logFile) return;
  fs.appendFileSync(logFile, `${new Date().toISOString()} ${stripAnsi(text)}\n`, "utf-8");
}

function write(plain: string, styled: string, stream: "out" | "err" = "out") {
  toFile(plain);
  if (capturing) {
    captured.push(stripAnsi(plain));
  } else if (stream === "err") {
    console.error(styled);
  } else {
    console.log(styled);
  }
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  /**
   * Mirrors every subsequent line into an append-only log file.
   * Returns the file path so callers can report it.
   */
  attachFile(dir: string, name: string): string {
    fs.mkdirSync(dir, { recursive: true });
    logFile = path.join(dir, logFileName(name));
    return logFile;
  },

  detachFile() {
    logFile = null;
  },

  info(msg: string) {
    write(`info ${msg}`, `${CYAN}info${RESET} ${msg}`);
  },

  success(msg: string) {
    write(`✓ ${msg}`, `${GREEN}✓${RESET} ${msg}`);
  },

  warn(msg: string) {
    write(`warn ${msg}`, `${YELLOW}warn${RESET} ${msg}`);
  },

  error(msg: string) {
    write(`error ${msg}`, `${RED}error${RESET} ${msg}`, "err");
  },

  dim(msg: string) {
    write(msg, `${DIM}${msg}${RESET}`);
  },

  bold(msg: string) {
    write(msg, `${BOLD}${msg}${RESET}`);
  },

  event(event: SyncEvent) {
    const subject = event.modId ? ` ${event.modId}` : "";
    const detail = event.detail ? ` (${event.detail})` : "";
    const line = `[${event.stage}]${subject} ${event.outcome}${detail}`;
    switch (event.outcome) {
      case "failed":
        logger.error(line);
        break;
      case "retry":
      case "collision":
        logger.warn(line);
        break;
      default:
        logger.info(line);
    }
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );

    const header = headers
      .map((h, i) => h.toUpperCase().padEnd(colWidths[i] ?? 0))
      .join("  ");

    write(`  ${header}`, `  ${DIM}${header}${RESET}`);
    for (const row of rows) {
      const line = row.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ");
      write(`  ${line}`, `  ${line}`);
    }
  },

  blank() {
    write("", "");
  },
};
