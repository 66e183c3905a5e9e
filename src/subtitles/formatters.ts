import type { Segment } from "../types.js";
import { ConfigurationError } from "../utils/errors.js";

export interface SubtitleFormatter {
  readonly formatName: string;
  readonly fileExtension: string;
  format(segments: Segment[]): string;
  parse(content: string): Segment[];
}

// HH:MM:SS.mmm or HH:MM:SS,mmm (hours optional, as WebVTT allows)
const TIMING_RE =
  /^\s*((?:\d+:)?\d{2}:\d{2}[.,]\d{3})\s*-->\s*((?:\d+:)?\d{2}:\d{2}[.,]\d{3})/;

function pad2(n: number) { return n.toString().padStart(2, "0"); }
function pad3(n: number) { return n.toString().padStart(3, "0"); }

export function formatTimestamp(seconds: number, separator: "." | ","): string {
  const ms = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  const msPart = ms % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}${separator}${pad3(msPart)}`;
}

export function parseTimestamp(timestamp: string): number {
  const parts = timestamp.trim().replace(",", ".").split(":");
  let seconds = 0;
  for (const part of parts) {
    seconds = seconds * 60 + Number(part);
  }
  // Snap to whole milliseconds so 3.5 stays 3.5 rather than 3.5000000000000004
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Splits timed text into cue blocks and reads each one. Lines before the
 * timing line (an SRT index, a WebVTT cue id) are ignored; every non-blank
 * line after it is cue text, which may be empty. Blocks without a timing
 * line are dropped.
 */
export function parseCues(content: string): Segment[] {
  const blocks = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n").split(/\n[ \t]*\n/);
  const segments: Segment[] = [];
  for (const block of blocks) {
    const lines = block.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
    const timingAt = lines.findIndex((l) => l.includes("-->"));
    if (timingAt < 0) continue;
    const match = TIMING_RE.exec(lines[timingAt]);
    if (!match) continue;
    const text = lines.slice(timingAt + 1);
    segments.push({
      index: segments.length + 1,
      start: parseTimestamp(match[1]),
      end: parseTimestamp(match[2]),
      text: text.join("\n"),
    });
  }
  return segments;
}

/** WebVTT: dot-decimal timestamps, `WEBVTT` header, no index lines. */
export class VttFormatter implements SubtitleFormatter {
  readonly formatName = "WebVTT";
  readonly fileExtension = "vtt";

  format(segments: Segment[]): string {
    const lines = ["WEBVTT", ""];
    for (const segment of segments) {
      lines.push(`${formatTimestamp(segment.start, ".")} --> ${formatTimestamp(segment.end, ".")}`);
      lines.push(segment.text);
      lines.push("");
    }
    return lines.join("\n");
  }

  parse(content: string): Segment[] {
    return parseCues(content);
  }
}

/** SubRip: comma-decimal timestamps, each cue preceded by its 1-based index. */
export class SrtFormatter implements SubtitleFormatter {
  readonly formatName = "SubRip";
  readonly fileExtension = "srt";

  format(segments: Segment[]): string {
    const lines: string[] = [];
    segments.forEach((segment, i) => {
      lines.push(String(i + 1));
      lines.push(`${formatTimestamp(segment.start, ",")} --> ${formatTimestamp(segment.end, ",")}`);
      lines.push(segment.text);
      lines.push("");
    });
    return lines.join("\n");
  }

  parse(content: string): Segment[] {
    return parseCues(content);
  }
}

export type FormatterFactory = () => SubtitleFormatter;

const formatters = new Map<string, FormatterFactory>([
  ["vtt", () => new VttFormatter()],
  ["webvtt", () => new VttFormatter()],
  ["srt", () => new SrtFormatter()],
  ["subrip", () => new SrtFormatter()],
]);

export function getSupportedFormats(): string[] {
  return [...formatters.keys()];
}

export function createFormatter(formatType: string): SubtitleFormatter {
  const factory = formatters.get(formatType.toLowerCase());
  if (!factory) {
    throw new ConfigurationError(
      `Unsupported format: ${formatType}. Supported: ${getSupportedFormats().join(", ")}`,
      { format: formatType }
    );
  }
  return factory();
}

export function registerFormatter(name: string, factory: FormatterFactory): void {
  formatters.set(name.toLowerCase(), factory);
}

export function convertSubtitleFormat(content: string, sourceFormat: string, targetFormat: string): string {
  const source = createFormatter(sourceFormat);
  const target = createFormatter(targetFormat);
  return target.format(source.parse(content));
}
