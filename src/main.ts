#!/usr/bin/env node
import "reflect-metadata";
import { ConsoleLogger, type INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";
import { buildProgram } from "./cli/program.js";
import { resolveLogLevels } from "./common/log-levels.js";
import { toStructuredError } from "./common/logging.js";
import { ProbeRunService } from "./prober/probe-run.service.js";
import { ReportService } from "./report/report.service.js";

const INTERRUPTED_EXIT_CODE = 130;

const createLogger = (context: string): ConsoleLogger =>
  new ConsoleLogger(context, {
    json: true,
    colors: false,
    logLevels: resolveLogLevels(process.env.LOG_LEVEL),
  });

/** Logger used before the Nest context exists and on exit paths. */
const exitLogger = createLogger("Main");

function logErrorAndExit(event: string, message: string, error: unknown): never {
  exitLogger.error({
    event,
    message,
    error: toStructuredError(error),
  });
  process.exit(1);
}

async function withApplicationContext<T>(run: (app: INestApplicationContext) => Promise<T>): Promise<T> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: createLogger("Main") });
  try {
    return await run(app);
  } finally {
    await app.close();
  }
}

/**
 * First SIGINT stops new batches and lets in-flight probes finish; a second
 * one exits immediately.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    exitLogger.warn({
      event: "interrupt_received",
      message: "Interrupt received; finishing in-flight probes and saving the checkpoint",
    });
    controller.abort();
  });
  return controller.signal;
}

const program = buildProgram({
  probe: async (options) => {
    const signal = interruptSignal();
    const summary = await withApplicationContext((app) => app.get(ProbeRunService).execute({ ...options, signal }));
    if (summary.aborted) {
      process.exitCode = INTERRUPTED_EXIT_CODE;
    }
  },
  report: async (options) => {
    await withApplicationContext((app) => app.get(ReportService).generate(options));
  },
});

process.on("unhandledRejection", (reason: unknown) => {
  logErrorAndExit("unhandled_rejection", "Unhandled rejection", reason);
});

void program.parseAsync(process.argv).catch((error: unknown) => logErrorAndExit("command_failed", "Command failed", error));
