import { CommandLineArgs } from "./CommandLineArgs";
import type { CommandLineArg } from "./CommandLineArg";

// Short option -> long option, generated from CommandLineArgs
export const shortOptions: Record<string, string> = Object.fromEntries(
    Object.entries(CommandLineArgs).flatMap(([longArg, arg]: [string, CommandLineArg]) =>
        arg.short ? [[`-${arg.short}`, `--${longArg}`]] : []
    )
);
