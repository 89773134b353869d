export { Dashboard } from "./dashboard.js";
export type { DashboardOptions } from "./dashboard.js";
export { TerminalSession } from "./terminal-session.js";
export type { TerminalInput, TerminalOutput } from "./terminal-session.js";
export { decodeKey } from "./input/decode-key.js";
export type { AppCommand, KeyPress } from "./input/decode-key.js";
export { renderFrame, statusLabel } from "./render/render-frame.js";
export type { FrameData, TerminalSize } from "./render/render-frame.js";
export { parseArgs } from "./lib/parse-args.js";
export type { CliArgs, ParsedArgs } from "./lib/parse-args.js";
export { loadConfig } from "./lib/load-config.js";
export type { LoadConfigResult } from "./lib/load-config.js";
