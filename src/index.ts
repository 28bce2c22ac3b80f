#!/usr/bin/env -S npx tsx
import { Command, InvalidArgumentError } from "commander";
import { getAppConfig } from "./config";
import {
  addShows,
  deactivate,
  formatDownloadedList,
  formatShowList,
  normaliseShowIds,
  purge,
  runDownloader,
} from "./downloader";
import { sendEmailReport } from "./services/email";
import { createEztvFeed } from "./services/eztv";
import { normaliseShowId } from "./services/imdb";
import { createTransmissionClient } from "./services/transmission";
import { loadCache } from "./utils/cache";
import { CacheError, TransmissionConnectionError } from "./utils/errors";
import { logger } from "./utils/logger";

type RunCommandOptions = {
  only?: string[];
  nosave?: boolean;
  transmissionHost?: string;
  transmissionPort?: number;
  pageCount?: number;
};

const parsePositive = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

const reportFatal = (error: unknown) => {
  if (error instanceof TransmissionConnectionError) {
    logger.error(`Error: ${error.message}`);
    logger.error(
      "Please ensure the Transmission daemon (transmission-daemon) is running and accessible.",
    );
    logger.error(
      "If Transmission runs on a different host or port, re-run with --transmission-host and --transmission-port.",
    );
    logger.error("Example: eztv-downloader run --transmission-host 192.168.1.100 --transmission-port 9091");
    return;
  }
  if (error instanceof CacheError) {
    logger.error(`Error: ${error.message}`);
    logger.error(`Fix or move ${error.path} before running again; it was not modified.`);
    return;
  }
  logger.error("Error:", error instanceof Error ? error.message : error);
};

const program = new Command();

program
  .name("eztv-downloader")
  .description("Queue new episodes of tracked shows from EZTV into Transmission")
  .version("1.0.0");

program
  .command("run", { isDefault: true })
  .description("Fetch listings for tracked shows and queue new episodes")
  .option("--only <ids...>", "For this run, only download these shows")
  .option("--nosave", "Queue downloads without saving episodes to the cache")
  .option("--transmission-host <host>", "Transmission RPC host")
  .option("--transmission-port <port>", "Transmission RPC port", parsePositive)
  .option("--page-count <count>", "Number of pages to fetch per show", parsePositive)
  .action(async (options: RunCommandOptions) => {
    const config = getAppConfig();
    const transmission = {
      ...config.transmission,
      host: options.transmissionHost ?? config.transmission.host,
      port: options.transmissionPort ?? config.transmission.port,
    };

    const result = await runDownloader({
      cachePath: config.cachePath,
      feed: createEztvFeed({ urls: config.eztvUrls, timeoutMs: config.requestTimeoutMs }),
      dispatcher: createTransmissionClient({ ...transmission, timeoutMs: config.requestTimeoutMs }),
      pageCount: options.pageCount ?? config.pageCount,
      only: options.only && normaliseShowIds(options.only),
      noSave: options.nosave === true,
      preference: config.preference,
      progress: process.stdout.isTTY === true,
    });

    await sendEmailReport(result.added, result.failed);
  });

program
  .command("add")
  .description("Track shows by IMDB id (e.g. tt0944947)")
  .argument("<ids...>", "IMDB ids")
  .option("--refresh", "Re-read metadata of shows already tracked")
  .action(async (ids: string[], options: { refresh?: boolean }) => {
    const config = getAppConfig();
    await addShows(config.cachePath, ids, options.refresh === true);
  });

program
  .command("list")
  .description("List all tracked shows")
  .action(async () => {
    const cache = await loadCache(getAppConfig().cachePath);
    logger.info("Shows in cache:");
    formatShowList(cache).forEach((line) => logger.info(line));
  });

program
  .command("list-downloaded")
  .description("List downloaded episodes")
  .argument("[id]", "Only list episodes of this show")
  .action(async (id: string | undefined) => {
    const cache = await loadCache(getAppConfig().cachePath);
    const showId = id === undefined ? undefined : (normaliseShowId(id) ?? id);
    formatDownloadedList(cache, showId).forEach((line) => logger.info(line));
  });

program
  .command("deactivate")
  .description("Deactivate shows in the cache, but retain the data")
  .argument("<ids...>", "IMDB ids")
  .action(async (ids: string[]) => {
    await deactivate(getAppConfig().cachePath, ids);
  });

program
  .command("purge")
  .description("Purge shows from the cache")
  .argument("<ids...>", "IMDB ids")
  .action(async (ids: string[]) => {
    await purge(getAppConfig().cachePath, ids);
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  reportFatal(error);
  process.exitCode = 1;
}
