import type { PipelineRun } from "../types/run.js";

/**
 * CLI exit codes. Test outcome takes precedence over the reporting outcome;
 * 3 only appears when every phase passed but finalize did not go through.
 */
export const EXIT = {
  SUCCESS: 0,
  PARTIAL_FAILURE: 1,
  ABORTED: 2,
  FINALIZATION_FAILED: 3,
  INVALID_CONFIG: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(run: Pick<PipelineRun, "overallStatus" | "finalization">): ExitCode {
  switch (run.overallStatus) {
    case "success":
      return run.finalization?.ok ? EXIT.SUCCESS : EXIT.FINALIZATION_FAILED;
    case "partial_failure":
      return EXIT.PARTIAL_FAILURE;
    default:
      return EXIT.ABORTED;
  }
}
