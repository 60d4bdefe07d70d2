/**
 * CLI progress display.
 *
 * Shows a spinner and progress bar on stderr while an observable runs.
 */

import type { Observable } from "rxjs";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface ProgressStream {
  write(chunk: string): unknown;
}

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: ProgressStream;
}

export interface ProgressCount {
  current: number;
  total: number;
}

export function formatProgressLine(
  prefix: string,
  label: string,
  progress: ProgressCount,
  unit: string,
  barWidth: number
): string {
  const { current, total } = progress;
  const filled = total > 0 ? Math.min(barWidth, Math.round((current / total) * barWidth)) : 0;
  const bar = "█".repeat(filled) + "░".repeat(barWidth - filled);
  return `${prefix} ${label}  ${bar}  ${current}/${total} ${unit}`;
}

export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => ProgressCount,
  options: ProgressOptions
): Promise<void> {
  const {
    label,
    unit = "documents",
    barWidth = 20,
    stream = process.stderr,
  } = options;

  let progress: ProgressCount = { current: 0, total: 0 };
  let frame = 0;

  function render(spinner: string) {
    stream.write(`\r${formatProgressLine(spinner, label, progress, unit, barWidth)}`);
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        progress = mapper(value);
        render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      },
      // the caller reports the error itself
      error(err) {
        clearInterval(timer);
        stream.write(`\r${formatProgressLine("✗", label, progress, unit, barWidth)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        const done = { current: progress.current, total: progress.current };
        stream.write(`\r${formatProgressLine("✔", label, done, unit, barWidth)}\n`);
        resolve();
      },
    });
  });
}
