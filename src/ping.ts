// src/ping.ts
// Пингер: держит хостинг бодрым, раз в PING_INTERVAL секунд дёргает PING_URL.
import { ConfigError, loadPingConfig } from "./config";
import { logger, toError } from "./lib/logger";

export type FetchLike = (url: string) => Promise<{ status: number }>;

/** Статус ответа или null при сетевой ошибке; никогда не бросает */
export async function pingOnce(url: string, fetchFn: FetchLike = fetch): Promise<number | null> {
  try {
    const res = await fetchFn(url);
    logger.info(`Ping ${url}: ${res.status}`, { action: "ping", status: res.status });
    return res.status;
  } catch (error) {
    logger.warn(`Ping ${url} failed`, { action: "ping_failed", error: toError(error) });
    return null;
  }
}

export function startPinger(url: string, intervalSec: number, fetchFn: FetchLike = fetch): () => void {
  void pingOnce(url, fetchFn);
  const timer = setInterval(() => {
    void pingOnce(url, fetchFn);
  }, intervalSec * 1000);
  return () => clearInterval(timer);
}

if (require.main === module) {
  try {
    const { pingUrl, pingIntervalSec } = loadPingConfig();
    logger.info(`Pinging ${pingUrl} every ${pingIntervalSec}s`, { action: "ping_start" });
    startPinger(pingUrl, pingIntervalSec);
  } catch (error) {
    const problems = error instanceof ConfigError ? error.problems : undefined;
    logger.error("Pinger failed to start", { action: "ping_start_failed", problems, error: toError(error) });
    process.exit(1);
  }
}
