import type { SyncReport } from '../../application/dto/SyncReport.js';

export type OutputFormat = 'json' | 'text';

/**
 * CLI 輸出格式化器
 *
 * - json：完整結構，給排程器或監控解析
 * - text：批次摘要 + 每份文件一行
 */
export class ReportFormatter {
  formatReport(report: SyncReport, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(report, null, 2);
    }
    return this.textReport(report);
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  private textReport(report: SyncReport): string {
    if (report.status === 'locked') {
      return 'Sync skipped: another run holds the lock.';
    }

    const c = report.counts;
    const seconds = (report.durationMs / 1000).toFixed(1);
    const lines = [
      `Sync ${report.status} (${report.mode}) in ${seconds}s`,
      `  fetched: ${c.fetched}  succeeded: ${c.succeeded}  enriched: ${c.enriched}  ` +
        `enrichment failed: ${c.enrichmentFailed}  consolidated: ${c.consolidated}  ` +
        `skipped: ${c.skipped}  failed: ${c.failed}`,
    ];
    if (report.remaining > 0) lines.push(`  remaining: ${report.remaining}`);
    if (report.checkpoint) {
      lines.push(`  checkpoint: ${report.checkpoint.createdAt}${report.checkpoint.documentId ? ` (${report.checkpoint.documentId})` : ''}`);
    }

    if (report.documents.length > 0) {
      lines.push('', 'Documents:');
      for (const d of report.documents) {
        const where = d.path ?? d.reason ?? d.error ?? '';
        lines.push(`  [${d.status}] ${d.title || d.documentId}${where ? ` → ${where}` : ''}`);
      }
    }

    if (report.errors.length > 0) {
      lines.push('', 'Errors:');
      for (const e of report.errors) lines.push(`  - ${e}`);
    }
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .filter(([, val]) => val !== undefined)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
