export function isoNow(): string {
  return new Date().toISOString();
}

const FILE_MODE_PATTERN = /^0?[0-7]{3}$/;

export function parseFileMode(value: string): number | null {
  const trimmed = value.trim();
  if (!FILE_MODE_PATTERN.test(trimmed)) return null;
  return parseInt(trimmed, 8);
}

export function formatFileMode(mode: number): string {
  return `0${(mode & 0o777).toString(8).padStart(3, "0")}`;
}

export function truncateText(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) return { text, truncated: false };
  return { text: text.slice(0, limit), truncated: true };
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
