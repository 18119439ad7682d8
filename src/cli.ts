import { Command, CommanderError } from "commander";
import ipaddr from "ipaddr.js";
import { loadConfig } from "./config/loader.js";
import type { EnvLookup } from "./config/expand-env.js";
import type { Config } from "./config/schema.js";
import { discoverNameservers } from "./dns/resolv-conf.js";
import { selectNameserver } from "./dns/select.js";
import { FATAL_EXIT_CODE, FatalError } from "./errors.js";
import { AddressFamily, familyToString, type NameServerEntry } from "./net/address.js";
import { isLocalAddress } from "./net/local-address.js";
import { buildSubprocessEnv } from "./system/search-path.js";
import { which } from "./system/which.js";
import { DiagnosticLogger, toVerbosity, type LogSink } from "./utils/logger.js";

export const CONFIG_PATH_ENV = "HOSTPROBE_CONFIG_PATH";

export interface CliIO {
  /** Command results */
  stdout: (text: string) => void;
  /** Diagnostics */
  stderr: LogSink;
  env: EnvLookup;
  version: string;
}

interface GlobalOptions {
  config?: string;
  verbose: number;
}

interface Session {
  config: Config;
  logger: DiagnosticLogger;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function formatEntry(entry: NameServerEntry): string {
  return `${familyToString(entry.family)} ${entry.address}`;
}

/**
 * Run the hostprobe CLI and resolve to its exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const println = (line: string) => io.stdout(`${line}\n`);

  const program = new Command();
  program
    .name("hostprobe")
    .description("Report DNS, address and executable facts about this host")
    .version(io.version)
    .option("-c, --config <path>", `Config file path (default: $${CONFIG_PATH_ENV})`, io.env[CONFIG_PATH_ENV])
    .option("-v, --verbose", "Increase diagnostic output (repeatable)", increaseVerbosity, 0)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  const openSession = async (): Promise<Session> => {
    const opts = program.opts<GlobalOptions>();
    const config = await loadConfig(opts.config, io.env);
    const verbosity = toVerbosity(Math.max(config.log.verbosity, opts.verbose));
    return {
      config,
      logger: new DiagnosticLogger({ prefix: config.log.prefix, verbosity }, io.stderr),
    };
  };

  program
    .command("nameservers")
    .description("List configured DNS servers")
    .option("--redirected", "Read the systemd-resolved upstream list instead of /etc/resolv.conf")
    .action(async (options: { redirected?: boolean }) => {
      const { config, logger } = await openSession();
      const entries = discoverNameservers(options.redirected === true, {
        logger,
        ...config.resolver,
      });
      for (const entry of entries) println(formatEntry(entry));
    });

  program
    .command("nameserver")
    .description("Pick one DNS server (127.0.0.1 when none is configured)")
    .option("--redirected", "Read the systemd-resolved upstream list instead of /etc/resolv.conf")
    .action(async (options: { redirected?: boolean }) => {
      const { config, logger } = await openSession();
      println(formatEntry(selectNameserver(options.redirected === true, { logger, ...config.resolver })));
    });

  program
    .command("is-local")
    .description("Check whether an address is assigned to this host")
    .argument("<address>", "IPv4 or IPv6 address")
    .action(async (address: string) => {
      const { logger } = await openSession();
      if (!ipaddr.isValid(address)) {
        logger.log(`Not an IP address: ${address}`);
        exitCode = 2;
        return;
      }
      const family = ipaddr.parse(address).kind() === "ipv6" ? AddressFamily.IPv6 : AddressFamily.IPv4;
      const local = await isLocalAddress(address, family);
      println(local ? "local" : "not local");
      exitCode = local ? 0 : 1;
    });

  program
    .command("which")
    .description("Locate an executable on the extended search path")
    .argument("<name>", "Program name")
    .action(async (name: string) => {
      const { config, logger } = await openSession();
      const found = which(name, { logger, env: io.env, fallbackDirs: config.path.fallbackDirs });
      if (found === null) {
        exitCode = 1;
        return;
      }
      println(found);
    });

  program
    .command("env")
    .description("Print the environment given to helper subprocesses")
    .action(async () => {
      const { config } = await openSession();
      const env = buildSubprocessEnv({ env: io.env, ...config.path });
      println(`PATH=${env.PATH}`);
      println(`LC_ALL=${env.LC_ALL}`);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const fallback = new DiagnosticLogger({ prefix: "hostprobe: ", verbosity: 0 }, io.stderr);
    if (err instanceof FatalError) {
      fallback.log(`fatal: ${err.message}`);
      return FATAL_EXIT_CODE;
    }
    fallback.log(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
