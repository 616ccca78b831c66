import { Command } from "commander";
import type { ProbeCommandOptions } from "../prober/probe-run.service.js";
import type { ReportCommandOptions } from "../report/report.types.js";
import { parsePositiveInt, parsePreparationIds } from "./cli-options.js";

export interface CliHandlers {
  probe(options: ProbeCommandOptions): Promise<void>;
  report(options: ReportCommandOptions): Promise<void>;
}

interface ProbeFlags {
  refresh?: boolean;
  recheckSkipped?: boolean;
  prepIds?: string[];
  batchSize?: number;
  concurrency?: number;
  probeNonActive?: boolean;
}

interface ReportFlags {
  out?: string;
}

export function buildProgram(handlers: CliHandlers): Command {
  const program = new Command();

  program
    .name("retrieval-audit")
    .description("Probe storage providers for prepared content and aggregate the results")
    .showHelpAfterError();

  program
    .command("probe")
    .description("Probe every (unit, provider) pair, resuming from the checkpoint")
    .option("--refresh", "back up and delete the checkpoint before probing")
    .option("--recheck-skipped", "re-evaluate pairs previously skipped for lack of an active agreement")
    .option("--prep-ids <ids>", "comma-separated preparation ids to probe", parsePreparationIds)
    .option("--batch-size <n>", "units per checkpoint flush", parsePositiveInt)
    .option("--concurrency <n>", "probes in flight per batch", parsePositiveInt)
    .option("--probe-non-active", "probe pairs without an active agreement instead of recording them as skipped")
    .action(async (_flags: unknown, command: Command) => {
      const flags = command.opts<ProbeFlags>();
      await handlers.probe({
        refresh: flags.refresh ?? false,
        recheckSkipped: flags.recheckSkipped ?? false,
        preparationIds: flags.prepIds,
        batchSize: flags.batchSize,
        concurrency: flags.concurrency,
        nonActiveMode: flags.probeNonActive ? "probe" : undefined,
      });
    });

  program
    .command("report")
    .description("Aggregate recorded probe results into the summary report")
    .option("--out <path>", "write the report here instead of the configured path")
    .action(async (_flags: unknown, command: Command) => {
      const flags = command.opts<ReportFlags>();
      await handlers.report({ out: flags.out });
    });

  return program;
}
