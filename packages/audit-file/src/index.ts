/**
 * @ssh-gate/audit-file
 *
 * File-based session audit sink
 *
 * Writes session audit events to JSONL (JSON Lines) files.
 * File naming: audit-YYYY-MM-DD.jsonl, one file per UTC day.
 * Write-only: reading the trail back is left to ordinary tools.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger, errorMessage, type AuditEvent, type AuditSink } from '@ssh-gate/core';

export interface FileAuditSinkOptions {
  /** Directory holding the audit files */
  auditDir: string;
  /** Days to keep old audit files; 0 keeps everything (default: 90) */
  retention?: number;
  /** Buffered events that trigger a flush (default: 100) */
  maxBuffered?: number;
}

/**
 * File-based Audit Sink
 *
 * Appends audit events to daily-rotated JSONL files.
 * Each event is one JSON object per line (no commas, no array wrapper).
 */
export class FileAuditSink implements AuditSink {
  readonly id = 'file_jsonl';

  private auditDir: string;
  private retention: number;
  private maxBuffered: number;
  private buffer: AuditEvent[] = [];
  private initialized = false;
  private isShuttingDown = false;
  private isFlushing = false;

  constructor(options: FileAuditSinkOptions) {
    this.auditDir = path.resolve(options.auditDir);
    this.retention = options.retention ?? 90;
    this.maxBuffered = options.maxBuffered ?? 100;
  }

  get directory(): string {
    return this.auditDir;
  }

  /**
   * Create the audit directory (owner-only) and prune expired files.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await fs.mkdir(this.auditDir, { recursive: true, mode: 0o700 });
    this.initialized = true;
    logger.debug(`[audit:file] Initialized: dir=${this.auditDir}, retention=${this.retention}d`);

    if (this.retention > 0) {
      await this.cleanupOldFiles();
    }
  }

  async emit(event: AuditEvent): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn(`[audit:file] Cannot emit event during shutdown: ${event.event_id}`);
      return;
    }

    this.buffer.push(event);

    if (this.buffer.length >= this.maxBuffered) {
      await this.flush();
    }
  }

  /**
   * Write buffered events to their day's file.
   *
   * Events that could not be written stay buffered for the next flush.
   */
  async flush(): Promise<void> {
    if (this.isFlushing || this.buffer.length === 0) {
      return;
    }

    this.isFlushing = true;
    const toFlush = this.buffer;
    this.buffer = [];

    try {
      await this.initialize();

      const eventsByDate = new Map<string, AuditEvent[]>();
      for (const event of toFlush) {
        const date = auditDate(event.timestamp);
        const events = eventsByDate.get(date) ?? [];
        events.push(event);
        eventsByDate.set(date, events);
      }

      let written = 0;
      for (const [date, events] of eventsByDate.entries()) {
        const filePath = path.join(this.auditDir, `audit-${date}.jsonl`);
        const lines = events.map(e => JSON.stringify(e)).join('\n') + '\n';
        try {
          await fs.appendFile(filePath, lines, { encoding: 'utf-8', mode: 0o600 });
          written += events.length;
        } catch (error) {
          logger.error(`[audit:file] Failed to write to ${filePath}: ${errorMessage(error)}`);
          this.buffer.unshift(...events);
        }
      }

      logger.debug(`[audit:file] Flushed ${written} events to disk`);
    } catch (error) {
      logger.error(`[audit:file] Flush error: ${errorMessage(error)}`);
      this.buffer.unshift(...toFlush);
    } finally {
      this.isFlushing = false;
    }
  }

  /**
   * Flush what is left and refuse further events.
   */
  async shutdown(): Promise<void> {
    await this.flush();
    this.isShuttingDown = true;
  }

  get pending(): number {
    return this.buffer.length;
  }

  private async cleanupOldFiles(): Promise<void> {
    try {
      const files = await fs.readdir(this.auditDir);
      const cutoff = auditDate(new Date(Date.now() - this.retention * 24 * 60 * 60 * 1000));

      for (const file of files) {
        const match = file.match(/^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/);
        if (!match?.[1] || match[1] >= cutoff) {
          continue;
        }
        await fs.unlink(path.join(this.auditDir, file));
        logger.debug(`[audit:file] Deleted old audit file: ${file}`);
      }
    } catch (error) {
      logger.warn(`[audit:file] Error during cleanup: ${errorMessage(error)}`);
    }
  }
}

/**
 * Audit file path for a given timestamp
 *
 * @returns e.g. /home/op/.ssh-gate/audit/audit-2026-02-16.jsonl
 */
export function getAuditFilePath(auditDir: string, date: string | Date): string {
  return path.join(auditDir, `audit-${auditDate(date)}.jsonl`);
}

function auditDate(value: string | Date): string {
  const d = typeof value === 'string' ? new Date(value) : value;
  return Number.isNaN(d.getTime()) ? 'undated' : d.toISOString().slice(0, 10);
}
