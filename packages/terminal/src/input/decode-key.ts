import type { Page, ViewCommand } from "@tradewatch/feed";

/** Shape of the `key` argument readline passes to "keypress" listeners. */
export interface KeyPress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type AppCommand = ViewCommand | { type: "QUIT" };

// One code point that is not a control, format or unassigned character.
const PRINTABLE = /^\P{C}$/u;

function decodeNormal(key: KeyPress, page: Page): AppCommand | null {
  switch (key.name) {
    case "up":
      return { type: "SCROLL_UP" };
    case "down":
      return { type: "SCROLL_DOWN" };
    case "tab":
      return page === "trades" ? { type: "TOGGLE_TRADE_FILTER" } : null;
  }

  switch (key.sequence) {
    case "q":
      return { type: "QUIT" };
    case "p":
      return { type: "SWITCH_PAGE" };
    case "k":
      return { type: "SCROLL_UP" };
    case "j":
      return { type: "SCROLL_DOWN" };
    case "c":
      return page === "trades" ? { type: "EDIT_COIN_FILTER" } : null;
    case "t":
      return page === "trades" ? { type: "EDIT_TRADER_FILTER" } : null;
    case "s":
      return page === "priceTracker" ? { type: "EDIT_TRACKED_SYMBOL" } : null;
    default:
      return null;
  }
}

function decodeEditing(key: KeyPress): AppCommand | null {
  switch (key.name) {
    case "return":
    case "enter":
      return { type: "CONFIRM" };
    case "escape":
      return { type: "CANCEL" };
    case "backspace":
      return { type: "DELETE_CHAR" };
  }
  if (key.meta || key.ctrl) return null;
  const char = key.sequence;
  if (char !== undefined && PRINTABLE.test(char)) {
    return { type: "APPEND_CHAR", char };
  }
  return null;
}

/**
 * Translate one keypress into a command. While a text field is being edited
 * every printable key is typed into it; otherwise keys are bound per page.
 * Returns null for keys with no binding there.
 */
export function decodeKey(key: KeyPress, editing: boolean, page: Page): AppCommand | null {
  if (key.ctrl && key.name === "c") return { type: "QUIT" };
  return editing ? decodeEditing(key) : decodeNormal(key, page);
}
