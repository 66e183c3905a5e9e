import path from "node:path";
import type { BatchSummary } from "../types.js";

function pad2(n: number) { return n.toString().padStart(2, "0"); }

function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

// Table cells cannot hold pipes or line breaks
function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\s*\r?\n\s*/g, " ").trim();
}

export function generateReport(summary: BatchSummary, now: Date = new Date()): string {
  const lines = [
    "# Batch Processing Summary",
    "",
    `**Date:** ${formatDate(now)}`,
    "",
    "## Statistics",
    "",
    "| Metric | Value |",
    "|--------|-------|",
    `| Total Files | ${summary.totalFiles} |`,
    `| Successful | ${summary.successful} |`,
    `| Failed | ${summary.failed} |`,
    `| Skipped | ${summary.skipped} |`,
    `| Total Duration | ${summary.totalDurationSeconds.toFixed(2)}s |`,
    "",
  ];

  if (summary.results.length > 0) {
    lines.push(
      "## Processed Files",
      "",
      "| File | Status | Duration | Output |",
      "|------|--------|----------|--------|"
    );
    for (const result of summary.results) {
      const status = result.success ? "✅ Success" : `❌ ${cell(result.error || "Failed")}`;
      const output = result.outputPath ? path.basename(result.outputPath) : "-";
      lines.push(
        `| ${cell(path.basename(result.filePath))} | ${status} | ${result.durationSeconds.toFixed(2)}s | ${cell(output)} |`
      );
    }
  }

  return lines.join("\n");
}
