import { EventEmitter } from "node:events";
import { emitKeypressEvents } from "node:readline";
import type { KeyPress } from "./input/decode-key.js";
import type { TerminalSize } from "./render/render-frame.js";

const ESC = "\u001b[";
const ENTER_ALT_SCREEN = `${ESC}?1049h`;
const LEAVE_ALT_SCREEN = `${ESC}?1049l`;
const HIDE_CURSOR = `${ESC}?25l`;
const SHOW_CURSOR = `${ESC}?25h`;
const CURSOR_HOME = `${ESC}H`;
const CLEAR_LINE_END = `${ESC}K`;
const CLEAR_BELOW = `${ESC}J`;

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput extends EventEmitter {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

export interface TerminalSessionEvents {
  "key": [key: KeyPress];
  "resize": [];
}

export declare interface TerminalSession {
  on<K extends keyof TerminalSessionEvents>(event: K, listener: (...args: TerminalSessionEvents[K]) => void): this;
  off<K extends keyof TerminalSessionEvents>(event: K, listener: (...args: TerminalSessionEvents[K]) => void): this;
  emit<K extends keyof TerminalSessionEvents>(event: K, ...args: TerminalSessionEvents[K]): boolean;
}

/**
 * Owns the terminal while the dashboard runs: raw mode, the alternate
 * screen and a hidden cursor, all restored by stop().
 */
export class TerminalSession extends EventEmitter {
  private input: TerminalInput;
  private output: TerminalOutput;
  private active = false;

  constructor(input: TerminalInput, output: TerminalOutput) {
    super();
    this.input = input;
    this.output = output;
  }

  get isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode?.(true);
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
    this.output.on("resize", this.onResize);
    this.output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.input.off("keypress", this.onKeypress);
    this.output.off("resize", this.onResize);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }

  size(): TerminalSize {
    const { columns, rows } = this.output;
    return {
      columns: columns && columns > 0 ? columns : FALLBACK_SIZE.columns,
      rows: rows && rows > 0 ? rows : FALLBACK_SIZE.rows,
    };
  }

  /** Repaint the whole screen in one write. */
  draw(lines: readonly string[]): void {
    if (!this.active) return;
    const body = lines.map((line) => line + CLEAR_LINE_END).join("\r\n");
    this.output.write(CURSOR_HOME + body + CLEAR_BELOW);
  }

  private onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (key) this.emit("key", key);
  };

  private onResize = (): void => {
    this.emit("resize");
  };
}
