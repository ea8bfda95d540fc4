import { z } from 'zod';
import type { Db } from '../db/database.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

const auditRowSchema = z.object({
  id: z.number(),
  timestamp: z.number(),
  level: z.enum(['INFO', 'WARN', 'ERROR', 'CRITICAL']),
  module: z.string(),
  action: z.string(),
  detail: z.string().nullable(),
  market: z.string().nullable(),
});

export type AuditEntry = z.infer<typeof auditRowSchema>;

/**
 * SQLite audit log: placements, fills, skips, emergency stops, shutdown.
 */
export class AuditLog {
  constructor(
    private readonly db: Db,
    private readonly market: string | null = null,
    private readonly now: () => number = Date.now,
  ) {}

  log(level: AuditLevel, module: string, action: string, detail?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, market)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(this.now(), level, module, action, detail ?? null, this.market);
  }

  info(module: string, action: string, detail?: string): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: string, detail?: string): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: string, detail?: string): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: string, detail?: string): void {
    this.log('CRITICAL', module, action, detail);
  }

  /** newest first */
  getRecent(limit: number = 50): AuditEntry[] {
    const rows: unknown = this.db
      .prepare('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit);
    return z.array(auditRowSchema).parse(rows);
  }
}
