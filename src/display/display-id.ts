import path from "node:path";

export type DisplayIdentifier = {
  host: string;
  display: number;
  screen: number;
};

const DISPLAY_PATTERN = /^([A-Za-z0-9.\-_]*):(\d+)(?:\.(\d+))?$/;

/** Parse an X display identifier such as ":99.0" or "localhost:10". */
export function parseDisplayIdentifier(identifier: string): DisplayIdentifier | null {
  const m = DISPLAY_PATTERN.exec(identifier.trim());
  if (!m) return null;
  return {
    host: m[1],
    display: parseInt(m[2], 10),
    screen: m[3] !== undefined ? parseInt(m[3], 10) : 0,
  };
}

/** Unix socket the X server listens on for a local display. */
export function displaySocketPath(socketDir: string, display: number): string {
  return path.join(socketDir, `X${display}`);
}
