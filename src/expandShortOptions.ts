import { shortOptions } from "./shortOptions";

/** Rewrites known short options (`-p 9000`) to their long form for convict. */
export function expandShortOptions(args: string[]): string[] {
    return args.map((arg: string) => (Object.hasOwn(shortOptions, arg) ? shortOptions[arg] : arg));
}
