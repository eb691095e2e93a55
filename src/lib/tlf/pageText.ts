import type { PageText } from "./types";

export function toPageText(raw: string): PageText {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
