// src/launcher.ts
// Запускает бота, веб и пингер отдельными процессами. Падение одного не трогает остальные.
import { spawn, type ChildProcess } from "child_process";
import path from "path";
import { logger, toError } from "./lib/logger";

export type LaunchEntry = { name: string; script: string };

export type SpawnFn = (command: string, args: string[]) => ChildProcess;

export const DEFAULT_ENTRIES: LaunchEntry[] = [
  { name: "web", script: path.join(__dirname, "web.js") },
  { name: "bot", script: path.join(__dirname, "index.js") },
  { name: "ping", script: path.join(__dirname, "ping.js") },
];

const defaultSpawn: SpawnFn = (command, args) => spawn(command, args, { stdio: "inherit" });

/** Запущенные процессы по имени; те, что не стартовали, пропускаются */
export function launchAll(entries: LaunchEntry[], spawnFn: SpawnFn = defaultSpawn): Map<string, ChildProcess> {
  const children = new Map<string, ChildProcess>();
  for (const entry of entries) {
    let child: ChildProcess;
    try {
      child = spawnFn(process.execPath, [entry.script]);
    } catch (error) {
      logger.error(`Failed to start ${entry.name}`, { action: "launch_failed", process: entry.name, error: toError(error) });
      continue;
    }
    child.on("error", (error: Error) => {
      logger.error(`Process ${entry.name} error`, { action: "launch_error", process: entry.name, error });
    });
    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      children.delete(entry.name);
      logger.warn(`Process ${entry.name} exited`, { action: "process_exit", process: entry.name, code, signal });
    });
    children.set(entry.name, child);
    logger.info(`Started ${entry.name}`, { action: "launch", process: entry.name, pid: child.pid });
  }
  return children;
}

if (require.main === module) {
  const children = launchAll(DEFAULT_ENTRIES);
  const stop = (signal: NodeJS.Signals) => {
    for (const child of children.values()) child.kill(signal);
  };
  process.once("SIGTERM", () => stop("SIGTERM"));
  process.once("SIGINT", () => stop("SIGINT"));
}
