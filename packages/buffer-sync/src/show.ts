import type { ChannelStore } from "./channel-store";

const RULE = "-".repeat(50);

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}

function clip(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

/**
 * Human-readable table of every slot of every channel. Not a stable format.
 */
export function renderChannels(
  names: readonly string[],
  stores: readonly ChannelStore<unknown>[],
  queueSize: number,
): string {
  const lines: string[] = [RULE];

  for (let slot = 0; slot < queueSize; slot++) {
    lines.push(`Element: ${slot}`);
    lines.push(
      `idx: |${"channel:".padStart(12)} | ${"val:".padStart(15)} | ${"timestamp:".padStart(15)}`,
    );
    lines.push(RULE);

    stores.forEach((store, idx) => {
      const name = clip(names[idx], 12).padStart(12);
      const entry = store.at(slot);
      if (entry) {
        lines.push(
          `${String(idx).padStart(4)} |${name} | ${clip(formatValue(entry.value), 15).padStart(15)} | ${String(entry.timestamp).padStart(15)}`,
        );
      } else {
        lines.push(`${String(idx).padStart(4)} |${name} | ${"empty".padStart(15)} |`);
      }
    });

    lines.push(RULE);
  }

  return lines.join("\n");
}
