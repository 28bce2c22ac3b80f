/**
 * Base error for everything the downloader reports to the user.
 */
export class DownloaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DownloaderError";
  }
}

export class ConfigError extends DownloaderError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The cache file exists but cannot be read or parsed.
 */
export class CacheError extends DownloaderError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CacheError";
  }
}

/**
 * A single feed page could not be fetched from any API mirror.
 */
export class FeedError extends DownloaderError {
  constructor(
    message: string,
    public readonly page: number,
  ) {
    super(message);
    this.name = "FeedError";
  }
}

/**
 * The Transmission daemon cannot be reached or refused the session.
 * Always fatal for a run.
 */
export class TransmissionConnectionError extends DownloaderError {
  constructor(
    message: string,
    public readonly endpoint: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransmissionConnectionError";
  }
}

/**
 * The daemon answered but refused one torrent.
 */
export class TorrentRejectedError extends DownloaderError {
  constructor(
    message: string,
    public readonly downloadUri: string,
  ) {
    super(message);
    this.name = "TorrentRejectedError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
