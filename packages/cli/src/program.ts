/**
 * @summary The snpctl command-line program.
 *
 * `snpctl [options] <phase>` runs one workflow phase and exits with its
 * status. `snpctl config` prints the resolved configuration and
 * `snpctl fetch-rhel-image` downloads a RHEL guest image to launch with `-i`.
 *
 * Used by:
 * - The executable entry point (index.ts)
 * - The CLI test suite, which passes its own environment, runner and output
 */

import fs from "node:fs/promises";
import path from "node:path";
import { Command, CommanderError } from "commander";
import {
  EXIT_CODES,
  SpawnCommandRunner,
  describeConfig,
  exitCodeFor,
  loadConfig,
  UsageError,
  toError,
  type CommandRunner,
  type ConfigOverrides,
  type Environment,
  type Reporter,
  type SnpctlConfig,
} from "@snpctl/core";
import { RhelImageClient, parseOsReleaseVersion } from "@snpctl/launcher";
import { PHASES, PHASE_DEFINITIONS, WorkflowEngine } from "@snpctl/workflow";
import { ConsoleReporter, type LineWriter } from "./console-reporter.js";

/**
 * Package version - should match package.json.
 */
export const VERSION = "0.1.0";

export interface CliDependencies {
  env: Environment;
  homeDir: string;
  /** Defaults to spawning real processes */
  runner?: CommandRunner;
  /** Defaults to a ConsoleReporter on the given writers */
  reporterFor?: (config: SnpctlConfig) => Reporter;
  stdout?: LineWriter;
  stderr?: LineWriter;
  /** Used by fetch-rhel-image; defaults to the global fetch */
  fetchFn?: typeof fetch;
  /** Defaults to reading /etc/os-release */
  readOsRelease?: () => Promise<string>;
}

type GlobalOptions = {
  nonUpm?: boolean;
  image?: string;
  debug?: boolean;
};

type FetchImageOptions = {
  output?: string;
  rhelVersion?: string;
};

function overridesFrom(options: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.nonUpm) {
    overrides.upm = false;
  }
  if (options.image !== undefined) {
    overrides.image = options.image;
  }
  if (options.debug) {
    overrides.debug = true;
  }
  return overrides;
}

function phaseHelp(): string {
  const width = Math.max(...PHASES.map((phase) => phase.length));
  const rows = PHASES.map(
    (phase) => `  ${phase.padEnd(width)}  ${PHASE_DEFINITIONS[phase].summary}`
  );
  return `\nPhases:\n${rows.join("\n")}\n`;
}

/**
 * Parse `args` (without the node and script paths), run the selected
 * command and return the process exit status.
 */
export async function runCli(args: readonly string[], deps: CliDependencies): Promise<number> {
  const stdout: LineWriter = deps.stdout ?? ((line) => console.log(line));
  const stderr: LineWriter = deps.stderr ?? ((line) => console.error(line));
  const reporterFor =
    deps.reporterFor ??
    ((config: SnpctlConfig) => new ConsoleReporter({ debug: config.debug, stdout, stderr }));

  let status: number = EXIT_CODES.OK;
  const program = new Command();

  program
    .name("snpctl")
    .description("Provision an SEV-SNP host, launch an SNP guest and attest it")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    })
    .option("-n, --non-upm", "build and launch the non-UPM stack")
    .option("-i, --image <path>", "use an existing guest image instead of creating one")
    .option("--debug", "print every host command and verbose progress")
    .addHelpText("after", phaseHelp());

  program
    .argument("<phase>", `one of: ${PHASES.join(", ")}`)
    .action(async (phase: string, options: GlobalOptions) => {
      const config = loadConfig(deps.env, overridesFrom(options), deps.homeDir);
      const engine = new WorkflowEngine({
        config,
        runner: deps.runner ?? new SpawnCommandRunner(),
        reporter: reporterFor(config),
      });
      status = await engine.run(phase);
    });

  program
    .command("config")
    .description("Print the resolved configuration")
    .action((_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      const config = loadConfig(deps.env, overridesFrom(options), deps.homeDir);
      for (const [key, value] of describeConfig(config)) {
        stdout(`${key}=${value}`);
      }
    });

  program
    .command("fetch-rhel-image")
    .description("Download the RHEL KVM guest image (needs REDHAT_OFFLINE_TOKEN)")
    .option("-o, --output <path>", "where to save the image")
    .option("--rhel-version <version>", "RHEL release to download (default: this host's)")
    .action(async (options: FetchImageOptions, command: Command) => {
      const config = loadConfig(
        deps.env,
        overridesFrom(command.optsWithGlobals<GlobalOptions>()),
        deps.homeDir
      );
      const reporter = reporterFor(config);
      const readOsRelease = deps.readOsRelease ?? (() => fs.readFile("/etc/os-release", "utf-8"));

      const version = options.rhelVersion ?? parseOsReleaseVersion(await readOsRelease());
      if (version === undefined) {
        throw new UsageError("No VERSION_ID in /etc/os-release, pass --rhel-version");
      }
      const { name } = config.guest;
      const image = options.output ?? path.join(config.launchDir, name, `${name}.qcow2`);

      const client = new RhelImageClient({
        offlineToken: deps.env["REDHAT_OFFLINE_TOKEN"] ?? "",
        runner: deps.runner ?? new SpawnCommandRunner(),
        fetchFn: deps.fetchFn,
      });
      reporter.step(`Fetching the RHEL ${version} guest image`);
      const result = await client.fetchGuestImage({ version, image });
      if (result.status === "present") {
        reporter.skip(`Guest image already present: ${image}`);
      } else {
        reporter.success(`Downloaded ${result.entry.filename ?? result.entry.imageName} to ${image}`);
      }
      reporter.info(`Launch it with: snpctl -i ${image} launch-guest`);
    });

  if (args.length === 0) {
    program.outputHelp();
    return EXIT_CODES.USAGE;
  }

  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE;
    }
    stderr(toError(err).message);
    return exitCodeFor(err);
  }
  return status;
}
