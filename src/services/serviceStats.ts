/**
 * Service counters. Written only by the print pipeline; readers get copies.
 */

export interface StatsSnapshot {
  emailsProcessed: number;
  emailsPrinted: number;
  printJobsFailed: number;
  emailsSkipped: number;
  /** Documents refused before submission (page limit, content type) */
  documentsRejected: number;
  serviceStartTime: Date | null;
}

export interface StatsReport extends StatsSnapshot {
  uptimeSeconds: number;
  uptimeFormatted: string;
}

/**
 * Human-readable uptime: `45s`, `3m 20s`, `2h 5m`.
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}

export class ServiceStats {
  private emailsProcessed = 0;
  private emailsPrinted = 0;
  private printJobsFailed = 0;
  private emailsSkipped = 0;
  private documentsRejected = 0;
  private serviceStartTime: Date | null = null;

  markStarted(at: Date = new Date()): void {
    this.serviceStartTime = at;
  }

  recordProcessed(): void {
    this.emailsProcessed++;
  }

  recordPrinted(): void {
    this.emailsPrinted++;
  }

  recordPrintFailure(): void {
    this.printJobsFailed++;
  }

  recordSkipped(): void {
    this.emailsSkipped++;
  }

  recordRejected(): void {
    this.documentsRejected++;
  }

  snapshot(): StatsSnapshot {
    return {
      emailsProcessed: this.emailsProcessed,
      emailsPrinted: this.emailsPrinted,
      printJobsFailed: this.printJobsFailed,
      emailsSkipped: this.emailsSkipped,
      documentsRejected: this.documentsRejected,
      serviceStartTime: this.serviceStartTime ? new Date(this.serviceStartTime) : null,
    };
  }

  report(now: Date = new Date()): StatsReport {
    const snapshot = this.snapshot();
    const uptimeSeconds = snapshot.serviceStartTime
      ? Math.max(0, Math.floor((now.getTime() - snapshot.serviceStartTime.getTime()) / 1000))
      : 0;
    return { ...snapshot, uptimeSeconds, uptimeFormatted: formatUptime(uptimeSeconds) };
  }

  /** Share of processed messages that printed, in percent */
  successRate(): number {
    if (this.emailsProcessed === 0) return 0;
    return Math.round((this.emailsPrinted / this.emailsProcessed) * 1000) / 10;
  }
}
