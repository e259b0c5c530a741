import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ExecutionTelemetry } from './types.js';

export interface AuditLogTarget {
  filePath?: string;
  /** When false the file keeps only the latest run. */
  append?: boolean;
}

/** Writes one JSON line per CLI run. */
export class AuditLogger {
  private readonly written = new Set<string>();

  async record(entry: ExecutionTelemetry, target: AuditLogTarget = {}): Promise<void> {
    const { filePath, append = true } = target;

    if (!filePath) {
      return;
    }

    const line = `${JSON.stringify(entry)}\n`;
    await mkdir(dirname(filePath), { recursive: true });

    if (append || this.written.has(filePath)) {
      await appendFile(filePath, line, 'utf-8');
    } else {
      await writeFile(filePath, line, 'utf-8');
    }

    this.written.add(filePath);
  }
}
