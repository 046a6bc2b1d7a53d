/**
 * Spinner wrapper that only animates in an interactive terminal.
 * Batch jobs and pipes get plain lines instead.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import type { OutputMode } from "./output/mode.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet, JSON and static modes.
 */
class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }
}

/**
 * Create a spinner; anything but `tui` mode without --quiet gets a silent one.
 */
export function createSpinner(mode: OutputMode, text?: string): Spinner {
  if (mode !== "tui" || isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
