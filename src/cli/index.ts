import { Command, InvalidArgumentError, Option } from "commander";

import { FileHistoryStore, resolveHistoryEnabled } from "../history/run-history.js";

import { loadConfigForCli } from "./config.js";
import { createCliReporter } from "./error-format.js";
import { createRunCommandContext, runCommand, type RunCommandOptions } from "./run.js";
import { parseLimit, runsListCommand } from "./runs.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function parseCpus(value: string): number {
  const cpus = Number(value);
  if (!Number.isInteger(cpus) || cpus < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return cpus;
}

export function buildCli(): Command {
  const program = new Command();
  const reporter = createCliReporter();

  const resolveConfig = (command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const loaded = loadConfigForCli({ explicitConfigPath: globals.config });
    for (const warning of loaded.warnings) {
      reporter.warn(warning);
    }
    return loaded;
  };

  program
    .name("podlaunch")
    .description("Launch workflow pipelines on a Kubernetes cluster")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override launcher config path (defaults to $PODLAUNCH_HOME/config.yaml when present)",
    )
    .option("--debug", "Show error codes, causes and stack traces")
    .enablePositionalOptions();

  program
    .command("run")
    .description("Execute a pipeline in a Kubernetes cluster")
    .argument("[pipeline]", "Pipeline to run, or - to read the script from standard input")
    .argument("[args...]", "Arguments passed to the pipeline")
    .option("-v, --volume-mount <claim:path>", "Volume claim mount, e.g. my-pvc:/mnt/path", collect)
    .option("-n, --namespace <name>", "Kubernetes namespace to use")
    .option("--head-image <image>", "Container image for the head pod")
    .option("--pod-image <image>", "Alias for --head-image (deprecated)")
    .option("--head-cpus <n>", "Number of CPUs requested for the head pod", parseCpus)
    .option("--head-memory <mem>", "Amount of memory requested for the head pod")
    .option("--head-prescript <script>", "Script to run before the pipeline starts")
    .addOption(
      new Option("--remote-config <file>", "Config file on the cluster to add to the configuration")
        .argParser(collect)
        .hideHelp(),
    )
    .option("--remote-profile <name>", "Configuration profile to select in the remote config")
    .option("--name <run-name>", "Name for the run (default: generated)")
    .option("--bg", "Submit the head pod and return without following its logs")
    .option("--ansi-log", "Enable ANSI logging (not supported for cluster launches)")
    .passThroughOptions()
    .action(
      async (
        pipeline: string | undefined,
        args: string[],
        opts: RunCommandOptions,
        command: Command,
      ) => {
        const { config, paths } = resolveConfig(command);
        const context = createRunCommandContext(config, paths, reporter);
        process.exitCode = await runCommand(pipeline, args, opts, context);
      },
    );

  program
    .command("runs")
    .description("List recorded runs, newest first")
    .option("--limit <n>", "Maximum number of runs", parseLimit)
    .option("--json", "Emit JSON output", false)
    .action(async (opts: { limit?: number; json?: boolean }, command: Command) => {
      const { config, paths } = resolveConfig(command);
      const history = new FileHistoryStore({
        paths,
        enabled: resolveHistoryEnabled(config.history.enabled),
      });
      await runsListCommand(history, opts);
    });

  return program;
}
