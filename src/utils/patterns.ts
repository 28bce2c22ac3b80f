/**
 * pattern to match HEVC releases.
 * Matches HEVC, x265, H265, H.265, etc.
 */
const hevc = /(?<![a-z\d])(?:HEVC|[xh]\.?265)(?![a-z\d])/i;

/**
 * pattern to match AVC releases.
 * Matches x264, H264, H.264, AVC, etc.
 */
const h264 = /(?<![a-z\d])(?:AVC|[xh]\.?264)(?![a-z\d])/i;

/**
 * pattern to match a resolution tag.
 * Matches 480p, 720p, 1080p, 2160p, etc.
 */
const resolution = /(?<![a-z\d])(\d{3,4})p(?![a-z\d])/i;

/**
 * pattern to match releases that carry a quality tag but no resolution.
 * Matches HDTV, PDTV, SDTV, DVDRip, etc.
 */
const standardDefinition = /(?<![a-z\d])(?:[HPS]DTV|DVDRip|WEB-?DL|WEBRip)(?![a-z\d])/i;

/**
 * pattern to match an IMDB identifier with or without its tt prefix.
 */
const imdbId = /^(?:tt)?(\d+)$/i;

export const patterns = {
  hevc,
  h264,
  resolution,
  standardDefinition,
  imdbId,
};
