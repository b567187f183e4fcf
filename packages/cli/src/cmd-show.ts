/**
 * pilkit show - print the analyzed form of a PIL file
 */
import * as fs from "node:fs";
import { analyzeString, formatAnalyzed, formatDiagnostics, formatDiagnostic } from "@pilkit/core";

export async function runShow(
  file: string,
  opts: { output?: string; pretty?: boolean }
): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const result = analyzeString(source, file);
  if (!result.analyzed) {
    console.error(formatDiagnostics(result.diagnostics, !!opts.pretty));
    return 2;
  }

  const text = formatAnalyzed(result.analyzed);
  try {
    if (opts.output) {
      fs.writeFileSync(opts.output, text, "utf-8");
    } else {
      console.log(text.trimEnd());
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, !!opts.pretty));
    return 4;
  }
  return 0;
}
