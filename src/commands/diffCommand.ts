import { z } from "zod";
import { buildDiffReport, renderDiffReport } from "../services/diffReport.js";
import { runDiffPipeline } from "../services/diffPipeline.js";
import { jsonReplacer } from "../utils/values.js";

export const diffOptionsSchema = z.object({
  tolerance: z.coerce.number().positive().optional(),
  limit: z.coerce.number().int().min(0).optional(),
  json: z.boolean().optional()
});

export type CommandOutput = {
  out: (text: string) => void;
  err: (text: string) => void;
};

/** Runs one comparison and reports it; the return value is the process exit code. */
export function runDiffCommand(
  baselinePath: string,
  comparisonPath: string,
  rawOptions: unknown,
  output: CommandOutput
): number {
  const parsed = diffOptionsSchema.safeParse(rawOptions ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    output.err(`Error: invalid option --${issue.path.join(".")}: ${issue.message}`);
    return 1;
  }

  const options = parsed.data;
  try {
    const result = runDiffPipeline(baselinePath, comparisonPath, { tolerance: options.tolerance });
    if (!result.ok) {
      output.err(`Error: ${result.error.message}`);
      return 1;
    }

    if (options.json) {
      output.out(JSON.stringify(result.value, jsonReplacer, 2));
    } else {
      output.out(renderDiffReport(buildDiffReport(result.value, { rowLimit: options.limit })));
    }
    return 0;
  } catch (error) {
    output.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
