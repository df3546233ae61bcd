import * as readline from 'readline';
import { BatchItem, BatchItemResult } from '../models/job.model';
import { formatSize, formatTime, truncate } from '../utils/formatter';
import { BatchCoordinator } from './batch.service';

interface BatchEvent {
  time: string;
  type: 'START' | 'COMPLETE' | 'FAIL';
  message: string;
}

const MAX_EVENTS = 100;

/**
 * Redraws a batch summary in place while downloads run.
 */
export class ProgressTracker {
  private startTime: number = Date.now();
  private active: Map<BatchItem, { title: string; startedAt: number }> = new Map();
  private updateInterval: NodeJS.Timeout | null = null;
  private lastOutputLines: number = 0;
  private events: BatchEvent[] = [];
  private bytesDownloaded: number = 0;

  private readonly onStart = (item: BatchItem) => this.handleStart(item);
  private readonly onComplete = (outcome: BatchItemResult, item: BatchItem) => this.handleFinish(outcome, item, 'COMPLETE');
  private readonly onFail = (outcome: BatchItemResult, item: BatchItem) => this.handleFinish(outcome, item, 'FAIL');

  constructor(
    private batch: BatchCoordinator,
    private output: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout,
    private updateFrequencyMs: number = 200
  ) {}

  public start(): void {
    this.stop();
    this.startTime = Date.now();

    this.batch.on('start', this.onStart);
    this.batch.on('complete', this.onComplete);
    this.batch.on('fail', this.onFail);

    this.updateInterval = setInterval(() => this.render(), this.updateFrequencyMs);
    this.render();
  }

  public stop(): void {
    this.batch.off('start', this.onStart);
    this.batch.off('complete', this.onComplete);
    this.batch.off('fail', this.onFail);

    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
      this.render();
    }
  }

  public getRecentEvents(count: number): BatchEvent[] {
    return this.events.slice(-count);
  }

  public getActiveTitles(): string[] {
    return Array.from(this.active.values(), entry => entry.title);
  }

  private logEvent(type: BatchEvent['type'], message: string): void {
    this.events.push({ time: new Date().toLocaleTimeString(), type, message });
    if (this.events.length > MAX_EVENTS) {
      this.events.shift();
    }
  }

  private handleStart(item: BatchItem): void {
    this.active.set(item, { title: item.descriptor.filename, startedAt: Date.now() });
    this.logEvent('START', `Started: ${item.descriptor.filename}`);
  }

  private handleFinish(outcome: BatchItemResult, item: BatchItem, type: 'COMPLETE' | 'FAIL'): void {
    this.active.delete(item);

    if (type === 'COMPLETE') {
      this.bytesDownloaded += outcome.result.fileSizeBytes;
      this.logEvent(type, `Downloaded: ${outcome.descriptor.filename} (${outcome.result.bitrateKbps} kbps)`);
    } else {
      this.logEvent(type, `Failed: ${outcome.descriptor.filename} (${outcome.result.error ?? 'unknown error'})`);
    }
  }

  private clearOutput(): void {
    if (this.lastOutputLines > 0 && this.output.isTTY) {
      readline.moveCursor(this.output, 0, -this.lastOutputLines);
      readline.clearScreenDown(this.output);
    }
  }

  private render(): void {
    this.clearOutput();

    const stats = this.batch.getStats();
    const done = stats.completed + stats.failed;
    const percentage = stats.total > 0 ? Math.round((done / stats.total) * 100) : 0;
    const lines: string[] = [];

    lines.push(
      `Progress: ${this.createProgressBar(percentage)} ${done}/${stats.total} (${percentage}%) | ` +
      `Failed: ${stats.failed} | ${formatSize(this.bytesDownloaded)} | Elapsed: ${formatTime(Date.now() - this.startTime)}`
    );

    if (this.active.size > 0) {
      lines.push('Active Downloads:');
      for (const { title, startedAt } of this.active.values()) {
        lines.push(`  ${truncate(title, 50).padEnd(50)} ${formatTime(Date.now() - startedAt)}`);
      }
    }

    const recent = this.getRecentEvents(5);
    lines.push('Recent Activity:');
    if (recent.length === 0) {
      lines.push('  No activity yet');
    } else {
      for (const event of recent) {
        lines.push(`  ${event.time} - ${event.type}: ${event.message}`);
      }
    }

    lines.push(`Queue: ${stats.queued} tracks`);

    this.output.write(lines.join('\n') + '\n');
    this.lastOutputLines = lines.length;
  }

  private createProgressBar(percentage: number, width: number = 20): string {
    const filledWidth = Math.floor((percentage / 100) * width);
    return `[${'='.repeat(filledWidth)}${' '.repeat(width - filledWidth)}]`;
  }
}
