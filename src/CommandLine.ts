export interface CommandLine {
    config: string | undefined;
    verbose: number;
    debug: boolean;
    help: boolean;
    version: boolean;
}
