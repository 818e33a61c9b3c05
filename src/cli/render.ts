import type { DisplayResult } from "../tools/normalize";

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Plain operator view of a display result; sections the server left null are skipped.
 */
export function renderToolResult(name: string, data: DisplayResult): string[] {
  const device = typeof data.device === "string" && data.device ? data.device : null;
  const lines = ["", `=== 🛠️  ${device ? `${name} [${device}]` : name} ===`];

  if (data.error) {
    lines.push(`❌ Server error: ${typeof data.error === "string" ? data.error : stringify(data.error)}`);
  }
  if (Array.isArray(data.commands) && data.commands.length > 0) {
    lines.push("🔧 Commands to device:");
    for (const command of data.commands) {
      lines.push(`  - ${String(command)}`);
    }
  }
  if (data.raw !== null) {
    lines.push("", "📡 RAW output:", "");
    lines.push(data.raw ? String(data.raw) : "<no raw output>");
  }
  if (data.parsed !== null) {
    lines.push("", "🧾 Parsed:", stringify(data.parsed));
  }
  if (data.saved !== null) {
    lines.push("", `💾 Saved to NVRAM: ${Boolean(data.saved)}`);
  }
  if (data.dry_run !== null) {
    lines.push(`🧪 Dry run: ${Boolean(data.dry_run)}`);
  }
  return lines;
}
