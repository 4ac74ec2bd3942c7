/**
 * Frame spinner for long-running steps (git clone, make package) in plain
 * output mode. On a non-TTY stream it prints the message once instead of
 * animating, so CI logs stay readable.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_INTERVAL_MS = 80;

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private currentFrame = 0;
  private isRunning = false;
  private readonly stream: NodeJS.WriteStream;

  constructor(message: string = 'Working...', stream: NodeJS.WriteStream = process.stdout) {
    this.message = message;
    this.stream = stream;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;
    this.currentFrame = 0;

    if (!this.stream.isTTY) {
      this.stream.write(`… ${this.message}\n`);
      return;
    }

    // Hide cursor
    this.stream.write('\x1B[?25l');
    this.intervalId = setInterval(() => {
      const frame = FRAMES[this.currentFrame % FRAMES.length];
      this.stream.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, FRAME_INTERVAL_MS);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    if (this.stream.isTTY) {
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      // Show cursor
      this.stream.write('\x1B[?25h');
    }
  }
}
