export const CODECS = ["HEVC", "H264", "unknown"] as const;
export type Codec = (typeof CODECS)[number];

export const RESOLUTIONS = ["1080p", "720p", "other", "unknown"] as const;
export type Resolution = (typeof RESOLUTIONS)[number];

export type ShowStatus = "active" | "inactive";

export type TrackedShow = {
  identifier: string;
  name: string;
  url?: string;
  status: ShowStatus;
};

export type TorrentCandidate = {
  episodeKey: string;
  showId: string;
  season: number;
  episode: number;
  codec: Codec;
  resolution: Resolution;
  seeders: number;
  downloadUri: string;
  filename: string;
  title: string;
};

export type DownloadedRecord = {
  episodeKey: string;
  showId: string;
  season: number;
  episode: number;
  filename: string;
  downloadUri: string;
  dispatchedAt: string;
};

export type Cache = {
  shows: Record<string, TrackedShow>;
  downloaded: Record<string, DownloadedRecord>;
};

/**
 * Ranking of codecs and resolutions, most preferred first.
 * Values missing from a list rank below every listed value.
 */
export type ReleasePreference = {
  codecs: Codec[];
  resolutions: Resolution[];
};

export type DispatchReport = {
  show: string;
  episodeKey: string;
  filename: string;
  duplicate: boolean;
};

/**
 * A failed dispatch, or a show whose listings could not be read when `episodeKey` is absent.
 */
export type DispatchFailure = {
  show: string;
  episodeKey?: string;
  reason: string;
};

export type TransmissionConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
};

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
};

export type AppConfig = {
  eztvUrls: string[];
  imdbUrl: string;
  cachePath: string;
  transmission: TransmissionConfig;
  pageCount: number;
  requestTimeoutMs: number;
  preference: ReleasePreference;
  smtp: SmtpConfig;
  reportEmail: string;
  fromEmail: string;
};
