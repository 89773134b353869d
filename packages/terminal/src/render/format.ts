const clock = new Intl.DateTimeFormat("en-GB", {
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
  hourCycle: "h23",
});

/** Local wall-clock time as HH:MM:SS. */
export function formatClock(date: Date): string {
  return clock.format(date);
}

export function fixed(value: number, digits: number): string {
  return value.toFixed(digits);
}

/** Percentage with an explicit sign for non-negative values, e.g. "+2.50%". */
export function signedPercent(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

/** Cut text to at most width code points. */
export function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  const chars = Array.from(text);
  return chars.length <= width ? text : chars.slice(0, width).join("");
}

export function padR(str: string | number, width: number): string {
  const s = truncate(String(str), width);
  return s + " ".repeat(Math.max(0, width - Array.from(s).length));
}

export function padL(str: string | number, width: number): string {
  const s = truncate(String(str), width);
  return " ".repeat(Math.max(0, width - Array.from(s).length)) + s;
}
