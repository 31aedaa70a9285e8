import { CommandLineArgs } from "./CommandLineArgs";
import type { CommandLineArg } from "./CommandLineArg";

export function argForPath(configPath: string): string | undefined {
    const entry = Object.entries(CommandLineArgs).find(([, arg]: [string, CommandLineArg]) => arg.path === configPath);
    return entry ? entry[0] : undefined;
}
