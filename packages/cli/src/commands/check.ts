/**
 * semport check command - diagnostics only
 */

import { map } from "@semport/frontend";
import type { MappingRun } from "@semport/mapper";
import type { ResolvedConfig, Result } from "../types.js";
import {
  printDiagnostics,
  printOutcomes,
  runPipeline,
  type PipelineFailure,
} from "./pipeline.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<MappingRun, PipelineFailure> =>
  map(runPipeline(config), (run) => {
    printDiagnostics(run.report.diagnostics);
    if (config.verbose) {
      printOutcomes(run);
    }
    if (!config.quiet) {
      const { mapped, bestEffort, unmappable } = run.report.counts;
      console.log(
        `Checked ${run.declarations.length + run.enumerations.length} declaration(s): ${mapped} mapped, ${bestEffort} best effort, ${unmappable} unmappable`
      );
    }
    return run;
  });
