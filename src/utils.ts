/**
 * MathTaxonomy-MCP: Core Utilities
 *
 * Deterministic utilities for hashing, file operations, and ID generation.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import * as fs from "fs/promises";
import { createReadStream } from "fs";
import * as path from "path";
import * as readline from "readline";
import type { EventLogEntry, ErrorCode, ToolError } from "./types.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Generate SHA256 hash of a file
 */
export async function hashFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return sha256(content);
}

/**
 * JSON.stringify with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(v => stableStringify(v === undefined ? null : v)).join(",")}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter(key => value[key] !== undefined)
      .map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Generate config hash for manifest
 */
export function hashConfig(config: unknown): string {
  return sha256(stableStringify(config));
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for run IDs
 */
export function generateRunId(): string {
  return uuidv7();
}

// ============================================================================
// Type Guards
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isToolError(value: unknown): value is ToolError {
  return isPlainObject(value) && value.isError === true && typeof value.code === "string";
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write JSONL file (append mode)
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  if (records.length === 0) return;
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

/**
 * Write JSONL file (overwrite mode)
 */
export async function writeJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n");
  await fs.writeFile(filePath, lines ? lines + "\n" : "", "utf-8");
}

/**
 * Read JSONL file
 */
export async function readJsonl<T>(filePath: string): Promise<T[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return content
    .split("\n")
    .filter(line => line.trim())
    .map(line => JSON.parse(line) as T);
}

/**
 * Stream a text file line by line (\n, \r\n)
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const rl = readline.createInterface({
    input: createReadStream(filePath, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

/**
 * Write JSON file
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Read JSON file
 */
export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content) as T;
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Split text into lines the way a line reader would (\n, \r\n, \r)
 */
export function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Round to a fixed number of decimal places
 */
export function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    success: false,
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

/**
 * Describe an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: EventLogEntry["level"],
  phase: string,
  tool: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    phase,
    tool,
    message,
    data,
  };
}

/**
 * Logger class for run operations
 */
export class RunLogger {
  private logsDir: string;

  constructor(runDir: string) {
    this.logsDir = path.join(runDir, "logs");
  }

  async init(): Promise<void> {
    await ensureDir(this.logsDir);
  }

  async log(entry: EventLogEntry): Promise<void> {
    const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
    await appendJsonl(path.join(this.logsDir, file), [entry]);
  }

  async info(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("info", phase, tool, message, data));
  }

  async warn(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("warn", phase, tool, message, data));
  }

  async error(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("error", phase, tool, message, data));
  }
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}
