import type { Ora } from 'ora';
import type { LogLevel } from '../types/index.js';

export class Logger {
  private spinner: Ora | null = null;
  private level: LogLevel = 'info';

  setSpinner(spinner: Ora) {
    this.spinner = spinner;
  }

  clearSpinner() {
    this.spinner = null;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  success(message: string) {
    if (this.level === 'silent') return;
    console.log(`✓ ${message}`);
  }

  error(message: string) {
    if (this.level === 'silent') return;
    console.error(`✗ ${message}`);
  }

  warn(message: string) {
    if (this.level === 'silent') return;
    console.warn(`⚠ ${message}`);
  }

  info(message: string) {
    if (this.level === 'silent') return;
    console.info(`ℹ ${message}`);
  }

  debug(message: string) {
    if (this.level !== 'debug') return;
    // Keep the spinner line intact while tracing
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      console.debug(`· ${message}`);
      this.spinner.render();
    } else {
      console.debug(`· ${message}`);
    }
  }
}

export const logger = new Logger();
