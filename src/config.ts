import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import type {
  AppConfig,
  Codec,
  ReleasePreference,
  Resolution,
  SmtpConfig,
  TransmissionConfig,
} from "./types";
import { CODECS, RESOLUTIONS } from "./types";
import { ConfigError } from "./utils/errors";

dotenv.config(); // Load environment variables from .env file

const DEFAULT_EZTV_URLS = ["https://eztvx.to/api", "https://eztv.tf/api"];

export const parsePositiveInt = (
  name: string,
  value: string | undefined,
  fallback: number,
): number => {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
};

const parseList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const parseOrder = <T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T[],
): T[] => {
  const items = parseList(value);
  if (items.length === 0) {
    return fallback;
  }
  return items.map((item) => {
    const match = allowed.find((candidate) => candidate.toLowerCase() === item.toLowerCase());
    if (!match) {
      throw new ConfigError(
        `${name} contains unknown value "${item}" (expected one of ${allowed.join(", ")})`,
      );
    }
    return match;
  });
};

const getEztvUrls = (): string[] => {
  const urls = parseList(process.env.EZTV_API_URLS);
  return (urls.length > 0 ? urls : DEFAULT_EZTV_URLS).map((url) =>
    url.replace(/\/+$/, ""),
  );
};

const getCachePath = (): string => {
  return (
    process.env.CACHE_PATH ||
    path.join(os.homedir(), ".eztv", "downloader.json")
  );
};

const getTransmissionConfig = (): TransmissionConfig => {
  return {
    host: process.env.TRANSMISSION_HOST || "localhost",
    port: parsePositiveInt("TRANSMISSION_PORT", process.env.TRANSMISSION_PORT, 9091),
    user: process.env.TRANSMISSION_USER || "",
    password: process.env.TRANSMISSION_PASSWORD || "",
  };
};

const getPreference = (): ReleasePreference => {
  return {
    codecs: parseOrder<Codec>("CODEC_PREFERENCE", process.env.CODEC_PREFERENCE, CODECS, [
      "HEVC",
      "H264",
    ]),
    resolutions: parseOrder<Resolution>(
      "RESOLUTION_PREFERENCE",
      process.env.RESOLUTION_PREFERENCE,
      RESOLUTIONS,
      ["1080p", "720p"],
    ),
  };
};

const getSmtpConfig = (): SmtpConfig => {
  return {
    host: process.env.SMTP_HOST || "smtp.gmail.com",
    port: parsePositiveInt("SMTP_PORT", process.env.SMTP_PORT, 587),
    secure: process.env.SMTP_SECURE === "true",
    user: process.env.SMTP_USER || "",
    password: process.env.SMTP_PASSWORD || "",
  };
};

const getFromEmail = (): string => {
  const from = process.env.FROM_EMAIL || "";
  return `"EZTV Downloader" <${from}>`;
};

export const getAppConfig = (): AppConfig => {
  return {
    eztvUrls: getEztvUrls(),
    imdbUrl: (process.env.IMDB_URL || "https://www.imdb.com").replace(/\/+$/, ""),
    cachePath: getCachePath(),
    transmission: getTransmissionConfig(),
    pageCount: parsePositiveInt("PAGE_COUNT", process.env.PAGE_COUNT, 20),
    requestTimeoutMs: parsePositiveInt(
      "REQUEST_TIMEOUT_MS",
      process.env.REQUEST_TIMEOUT_MS,
      10000,
    ),
    preference: getPreference(),
    smtp: getSmtpConfig(),
    reportEmail: process.env.RECIPIENT_EMAIL || "",
    fromEmail: getFromEmail(),
  };
};
