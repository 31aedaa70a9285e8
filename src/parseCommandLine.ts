import yargs from "yargs";
import type { CommandLine } from "./CommandLine";

/**
 * Parses the options that are not config values. Everything else on the
 * command line is left for convict.
 */
export function parseCommandLine(args: string[]): CommandLine {
    const argv = yargs(args)
        .option("config", {
            type: "string",
            description: "Path to a JSON config file"
        })
        .option("verbose", {
            alias: "v",
            type: "count",
            description: "Enable verbose logging (use -v for debug, -vv for verbose)"
        })
        .option("debug", {
            alias: "d",
            type: "boolean",
            default: false,
            description: "Set logging level to debug"
        })
        .option("help", {
            alias: "h",
            type: "boolean",
            default: false
        })
        .option("version", {
            type: "boolean",
            default: false
        })
        .help(false)
        .version(false)
        .strict(false)
        .parseSync();

    return {
        config: argv.config,
        verbose: argv.verbose,
        debug: argv.debug,
        help: argv.help,
        version: argv.version
    };
}
