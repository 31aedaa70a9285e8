export const VERSION = "0.10.0";
