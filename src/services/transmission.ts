import { z } from "zod";
import type { TransmissionConfig } from "../types";
import {
  TorrentRejectedError,
  TransmissionConnectionError,
  errorMessage,
} from "../utils/errors";

export type AddedTorrent = {
  id?: number;
  name: string;
  hashString: string;
  duplicate: boolean;
};

export interface Dispatcher {
  /**
   * Check that the daemon answers.
   * @returns the daemon version
   * @throws TransmissionConnectionError
   */
  connect(): Promise<string>;
  /**
   * Queue a magnet link or torrent URL.
   * @throws TransmissionConnectionError when the daemon cannot be reached
   * @throws TorrentRejectedError when the daemon refuses the torrent
   */
  addTorrent(downloadUri: string): Promise<AddedTorrent>;
}

export type TransmissionClientOptions = TransmissionConfig & {
  timeoutMs: number;
};

const SESSION_HEADER = "X-Transmission-Session-Id";

const rpcResponseSchema = z.object({
  result: z.string(),
  arguments: z.record(z.unknown()).optional(),
});

const torrentSchema = z.object({
  id: z.number().optional(),
  name: z.string().default(""),
  hashString: z.string().default(""),
});

type RpcResponse = z.infer<typeof rpcResponseSchema>;

export const buildRpcUrl = ({ host, port }: TransmissionConfig): string =>
  `http://${host}:${port}/transmission/rpc`;

/**
 * Create a JSON-RPC client for a Transmission daemon.
 * The session id handed out with a 409 answer is kept and replayed on later calls.
 */
export const createTransmissionClient = (
  options: TransmissionClientOptions,
): Dispatcher => {
  const endpoint = buildRpcUrl(options);
  let sessionId: string | null = null;

  const buildHeaders = (): Record<string, string> => {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (sessionId) {
      headers[SESSION_HEADER] = sessionId;
    }
    if (options.user) {
      const credentials = Buffer.from(`${options.user}:${options.password}`).toString("base64");
      headers.Authorization = `Basic ${credentials}`;
    }
    return headers;
  };

  const post = async (body: string): Promise<Response> => {
    try {
      return await fetch(endpoint, {
        method: "POST",
        headers: buildHeaders(),
        body,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      throw new TransmissionConnectionError(
        `Cannot connect to Transmission at ${endpoint}: ${errorMessage(error)}`,
        endpoint,
        { cause: error },
      );
    }
  };

  const rpc = async (
    method: string,
    args: Record<string, unknown> = {},
  ): Promise<RpcResponse> => {
    const body = JSON.stringify({ method, arguments: args });

    let response = await post(body);
    if (response.status === 409) {
      sessionId = response.headers.get(SESSION_HEADER);
      response = await post(body);
    }

    if (response.status === 401 || response.status === 403) {
      throw new TransmissionConnectionError(
        `Authentication failed for Transmission at ${endpoint} (HTTP ${response.status})`,
        endpoint,
      );
    }
    if (!response.ok) {
      throw new TransmissionConnectionError(
        `Transmission at ${endpoint} answered HTTP ${response.status}`,
        endpoint,
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new TransmissionConnectionError(
        `Transmission at ${endpoint} did not answer with JSON`,
        endpoint,
        { cause: error },
      );
    }
    const parsed = rpcResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransmissionConnectionError(
        `Transmission at ${endpoint} sent an unexpected RPC response`,
        endpoint,
      );
    }
    return parsed.data;
  };

  const connect = async (): Promise<string> => {
    const response = await rpc("session-get", { fields: ["version"] });
    if (response.result !== "success") {
      throw new TransmissionConnectionError(
        `Transmission at ${endpoint} refused the session: ${response.result}`,
        endpoint,
      );
    }
    const version = response.arguments?.version;
    return typeof version === "string" ? version : "unknown";
  };

  const addTorrent = async (downloadUri: string): Promise<AddedTorrent> => {
    const response = await rpc("torrent-add", { filename: downloadUri });
    if (response.result !== "success") {
      throw new TorrentRejectedError(
        `Transmission rejected the torrent: ${response.result}`,
        downloadUri,
      );
    }

    const duplicate = response.arguments?.["torrent-duplicate"];
    const added = torrentSchema.safeParse(duplicate ?? response.arguments?.["torrent-added"]);
    if (!added.success) {
      throw new TorrentRejectedError(
        "Transmission accepted the request but reported no torrent",
        downloadUri,
      );
    }
    return { ...added.data, duplicate: duplicate !== undefined };
  };

  return { connect, addTorrent };
};
