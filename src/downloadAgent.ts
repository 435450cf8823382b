import { spawn } from "node:child_process";
import { promises as fsPromises } from "node:fs";
import path from "node:path";
import { DownloadAgentError } from "./errors.js";

export const MANIFEST_FILE = "download.txt";

export async function writeManifest(dir: string, text: string): Promise<string> {
  await fsPromises.mkdir(dir, { recursive: true });
  const manifestPath = path.join(dir, MANIFEST_FILE);
  await fsPromises.writeFile(manifestPath, text, "utf8");
  return manifestPath;
}

export function aria2Args(dir: string): string[] {
  return [
    "-x", "16",
    "-s", "16",
    "-k", "1M",
    "--auto-file-renaming=false",
    "--allow-overwrite=false",
    "--conditional-get=true",
    "-d", dir,
    "-i", path.join(dir, MANIFEST_FILE)
  ];
}

/** Hands the manifest in `dir` to aria2c and waits for it; a non-zero exit is an error. */
export function runAria2(dir: string, binary = process.env.ARIA2C_BIN ?? "aria2c"): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(binary, aria2Args(dir), { stdio: "inherit" });
    proc.on("error", (err) => {
      reject(new DownloadAgentError(`Could not start ${binary}: ${err.message}`, null));
    });
    proc.on("exit", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new DownloadAgentError(`${binary} exited (code=${code ?? "null"}, signal=${signal ?? "null"})`, code));
    });
  });
}
