// src/constants.ts
export const CLI_NAME = "dirmirror";
export const VERSION = "0.3.0";

// gitignore-style rules read from the root of the source tree
export const IGNORE_FILE = ".sync-ignore";
