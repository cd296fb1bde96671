const FALLBACK_COLUMNS = 80;

export interface TerminalStream {
  isTTY?: boolean;
  columns?: number;
}

export function terminalWidth(stream: TerminalStream = process.stdout): number {
  if (stream.isTTY && stream.columns !== undefined && stream.columns > 0) {
    return stream.columns;
  }
  return FALLBACK_COLUMNS;
}
