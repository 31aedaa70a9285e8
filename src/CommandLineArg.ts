export interface CommandLineArg {
    path: string;
    short?: string;
}
