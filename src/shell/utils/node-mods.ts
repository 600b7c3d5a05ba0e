// CHANGE: Central re-exports of the Node built-ins the shell uses
// WHY: One import block for fs/path/child_process across shell modules
// INVARIANT: Re-export through constants; node:path and node:fs use `export =`
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { exec, execFile } from "node:child_process";
export { promisify } from "node:util";

export const fs = fsNS;
export const fsp = fsNS.promises;
export const path = pathNS;

export { fileURLToPath, pathToFileURL } from "node:url";
