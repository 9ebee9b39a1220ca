export class ProgressIndicator {
  private spinner = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private message: string;
  private interactive: boolean;

  constructor(message: string, interactive: boolean = process.stdout.isTTY === true) {
    this.message = message;
    this.interactive = interactive;
  }

  start(): void {
    if (!this.interactive) {
      console.log(`… ${this.message}`);
      return;
    }
    process.stdout.write('\x1B[?25l'); // Hide cursor
    this.interval = setInterval(() => {
      process.stdout.write(`\r${this.spinner[this.currentFrame]} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % this.spinner.length;
    }, 100);
  }

  stop(finalMessage?: string): void {
    this.finish(finalMessage ? `✅ ${finalMessage}` : undefined);
  }

  fail(errorMessage?: string): void {
    this.finish(errorMessage ? `❌ ${errorMessage}` : undefined);
  }

  private finish(line?: string): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.interactive) {
      process.stdout.write('\r\x1B[K'); // Clear line
      process.stdout.write('\x1B[?25h'); // Show cursor
    }
    if (line) {
      console.log(line);
    }
  }
}

/**
 * Per-file progress for directory ingestion. Redraws in place on a TTY, one line per file otherwise.
 */
export class ProgressBar {
  private total: number;
  private width: number = 30;
  private interactive: boolean;

  constructor(total: number, interactive: boolean = process.stdout.isTTY === true) {
    this.total = total;
    this.interactive = interactive;
  }

  update(current: number, label: string): void {
    const ratio = this.total === 0 ? 1 : current / this.total;
    const percentage = Math.round(ratio * 100);

    if (!this.interactive) {
      console.log(`  [${current}/${this.total}] ${label}`);
      return;
    }

    const filled = Math.round(ratio * this.width);
    const bar = '█'.repeat(filled) + '░'.repeat(this.width - filled);
    process.stdout.write(`\r\x1B[K[${bar}] ${percentage}% (${current}/${this.total}) ${label}`);
  }

  finish(): void {
    if (this.interactive) {
      process.stdout.write('\n');
    }
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${(ms / 1000).toFixed(1)}s`;
  }
}
