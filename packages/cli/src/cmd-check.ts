/**
 * pilkit check - parse and analyze without generating a witness
 */
import * as fs from "node:fs";
import { analyzeString, formatDiagnostics, formatDiagnostic } from "@pilkit/core";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; stableJson?: boolean }
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

  const { analyzed } = result;
  if (opts.pretty) {
    console.log("No errors found.");
    console.log(
      `  polynomials: ${analyzed.commitmentCount()} committed, ${analyzed.constantCount()} constant, ` +
        `${analyzed.intermediateCount()} intermediate; identities: ${analyzed.identities.length}`
    );
  } else if (opts.stableJson) {
    console.log("{\"ok\":true,\"errors\":[]}");
  } else {
    console.log("[]");
  }
  return 0;
}
