/**
 * Logger
 *
 * Semantic logging for embedkit operations:
 * - REGISTER: a client was (re)registered
 * - BATCH: a multimodal batch started, progressed, finished
 *
 * Silent unless enabled through settings (logging.enabled).
 * Credentials never reach a log line: only provider and model names are printed.
 */

import type { ClientDescriptor, PipelineStage, ProcessingStats } from '@/core/types';
import { c } from './colors';

let enabled = false;

export function configureLogger(options: { enabled: boolean }): void {
  enabled = options.enabled;
}

export function isLoggingEnabled(): boolean {
  return enabled;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Collapse newlines and runs of spaces
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

/**
 * One-line stats summary, e.g. "9/10 ok, 1 failed in 1.20s (8.3 items/s)".
 */
export function formatStatsLine(stats: ProcessingStats): string {
  const seconds = (stats.totalDurationMs / 1000).toFixed(2);
  return (
    `${stats.successful}/${stats.totalProcessed} ok, ${stats.failed} failed ` +
    `in ${seconds}s (${stats.throughput.toFixed(1)} items/s)`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registration Logging (REGISTER)
// ═══════════════════════════════════════════════════════════════════════════════

export function logClientRegistered(name: string, descriptor: ClientDescriptor): void {
  if (!enabled) return;

  const time = c.dim(formatTime());
  const target = `${descriptor.provider}/${descriptor.model}`;
  const vision = descriptor.vision
    ? ` ${c.dim('+ vision')} ${descriptor.vision.provider}/${descriptor.vision.model}`
    : '';
  console.log(`${time} ${c.cyan('REGISTER')} ${c.white(name)} → ${target}${vision}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Batch Logging (BATCH)
// ═══════════════════════════════════════════════════════════════════════════════

export function logBatchStart(name: string, itemCount: number, concurrency: number): void {
  if (!enabled) return;

  const time = c.dim(formatTime());
  console.log(
    `${time} ${c.magenta('BATCH')} ${c.white(name)}: ${itemCount} items ${c.dim(`(concurrency ${concurrency})`)}`
  );
}

export function logBatchProgress(completed: number, total: number): void {
  if (!enabled) return;
  console.log(`${INDENT}${c.dim(`… ${completed}/${total}`)}`);
}

export function logItemFailure(index: number, stage: PipelineStage, error: string): void {
  if (!enabled) return;
  console.log(`${INDENT}${c.brightRed('✗')} item ${index} ${c.dim(`[${stage}]`)} ${truncate(error, 80)}`);
}

export function logBatchResult(stats: ProcessingStats): void {
  if (!enabled) return;

  const mark = stats.failed === 0 ? c.brightGreen('✓') : c.yellow('!');
  console.log(`${INDENT}${mark} ${formatStatsLine(stats)}`);
}
