import nodemailer from "nodemailer";
import { getAppConfig } from "../config";
import type { DispatchFailure, DispatchReport } from "../types";
import { logger } from "../utils/logger";

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

/**
 * Render the run summary as HTML, grouped by show.
 */
export const buildReportHtml = (
  added: DispatchReport[],
  failed: DispatchFailure[],
): string => {
  const groups = new Map<string, DispatchReport[]>();
  for (const report of added) {
    groups.set(report.show, [...(groups.get(report.show) ?? []), report]);
  }

  const addedSection =
    groups.size > 0
      ? [...groups.entries()]
          .map(
            ([show, reports]) =>
              `<h2>${escapeHtml(show)}</h2><ul>${reports
                .map((report) => `<li>${escapeHtml(report.episodeKey)} - ${escapeHtml(report.filename)}</li>`)
                .join("")}</ul>`,
          )
          .join("")
      : "<p>No new episodes found.</p>";

  const failedSection =
    failed.length > 0
      ? `<h2>Failed</h2><ul>${failed
          .map((failure) => `<li>${escapeHtml(failure.show)}${failure.episodeKey ? ` ${escapeHtml(failure.episodeKey)}` : ""}: ${escapeHtml(failure.reason)}</li>`)
          .join("")}</ul>`
      : "";

  return `<h1>EZTV Downloader Report</h1>${addedSection}${failedSection}`;
};

/**
 * Send the run summary by email. Does nothing when no recipient is configured.
 * Delivery failures are logged and never fail the run.
 */
export const sendEmailReport = async (
  added: DispatchReport[],
  failed: DispatchFailure[],
): Promise<void> => {
  const appConfig = getAppConfig();
  if (!appConfig.reportEmail) {
    return;
  }

  const transporter = nodemailer.createTransport({
    host: appConfig.smtp.host,
    port: appConfig.smtp.port,
    secure: appConfig.smtp.secure,
    auth: {
      user: appConfig.smtp.user,
      pass: appConfig.smtp.password,
    },
  });

  const mailOptions = {
    from: appConfig.fromEmail,
    to: appConfig.reportEmail,
    subject: `EZTV Downloader Report - ${added.length} new episode(s)`,
    html: buildReportHtml(added, failed),
  };

  try {
    await transporter.sendMail(mailOptions);
    logger.info("Email report sent successfully.");
  } catch (error) {
    logger.error("Error sending email report:", error);
  }
};
