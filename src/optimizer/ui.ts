/**
 * UI utilities for console output
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT SWITCH
// ═══════════════════════════════════════════════════════════════════════════

let outputEnabled = true;

/**
 * Turn console output on or off (logLevel 'silent' turns it off).
 */
export function setOutputEnabled(enabled: boolean): void {
  outputEnabled = enabled;
  if (!enabled) spinner.stop();
}

export function isOutputEnabled(): boolean {
  return outputEnabled;
}

/**
 * Write one line to the console, unless output is off.
 */
export function print(line = ''): void {
  if (outputEnabled) console.log(line);
}

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  // Text styling
  bold: chalk.bold,
  dim: chalk.dim,

  // Symbols (cross-platform via figures)
  check: chalk.green(figures.tick),
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  bullet: chalk.dim(figures.bullet),
  pointer: chalk.yellow(figures.pointer),

  // Formatting helpers
  separator: chalk.dim(' · '),
  divider: (label: string, width = 60) => {
    const prefix = `━━━ ${label} `;
    const remaining = Math.max(0, width - prefix.length);
    return chalk.cyan.dim(prefix + '━'.repeat(remaining));
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER MANAGER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  /**
   * Start a spinner with the given text
   */
  start(text: string): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
    if (!outputEnabled) return;
    activeSpinner = ora({
      text,
      spinner: 'dots',
      indent: 4,
    }).start();
  },

  /**
   * Stop the current spinner (no status indicator)
   */
  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },

  isActive(): boolean {
    return activeSpinner !== null;
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  start(total: number): void;
  update(current: number): void;
  stop(): void;
}

export function createProgressTracker(label: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;
  let startTime = 0;
  let lastUpdate = 0;
  const MIN_UPDATE_INTERVAL = 100; // ms

  return {
    start(total: number) {
      spinner.stop();
      if (!outputEnabled) return;

      startTime = Date.now();
      bar = new cliProgress.SingleBar({
        format: `    {bar} {percentage}%  {value}/{total} ${label}  {duration_formatted}`,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 20,
        hideCursor: true,
        clearOnComplete: false,
        stopOnComplete: false,
        forceRedraw: true,
        fps: 10,
      });
      bar.start(total, 0, { duration_formatted: '0s' });
    },

    update(current: number) {
      if (!bar) return;
      const now = Date.now();
      // Throttle updates to prevent flickering
      if (now - lastUpdate < MIN_UPDATE_INTERVAL && current < bar.getTotal()) {
        return;
      }
      lastUpdate = now;
      const elapsed = Math.round((now - startTime) / 1000);
      bar.update(current, { duration_formatted: `${elapsed}s` });
    },

    stop() {
      if (bar) {
        const elapsed = Math.round((Date.now() - startTime) / 1000);
        bar.update(bar.getTotal(), { duration_formatted: `${elapsed}s` });
        bar.stop();
        bar = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatCost(cost: number): string {
  return theme.dim(`$${cost.toFixed(4)}`);
}

export function formatCostShort(cost: number): string {
  return theme.dim(`$${cost.toFixed(2)}`);
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}

export function formatPercentage(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatTokens(tokens: number): string {
  if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M`;
  if (tokens >= 1_000) return `${Math.round(tokens / 1_000)}K`;
  return String(tokens);
}
