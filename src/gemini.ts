/**
 * Minimal Gemini protocol client
 *
 * A request is the absolute URL followed by CRLF; the response is a
 * '<status> <meta>' header line followed by the body. The connection is
 * closed by the server once the body is sent.
 */

import { isIP } from "node:net";
import * as tls from "node:tls";
import { errorMessage, FetchError } from "./errors.js";
import type { FetchedDocument } from "./types.js";
import { parseContentType, resolveUrl } from "./utils.js";

export const GEMINI_DEFAULT_PORT = 1965;

/** Redirect hops followed before giving up */
export const MAX_REDIRECTS = 5;

/** Parsed response header plus raw body */
export interface GeminiResponse {
  status: number;
  meta: string;
  body: Buffer;
}

/** Sends one request and resolves with the full raw response */
export type GeminiRequest = (url: URL, timeoutMs: number) => Promise<Buffer>;

/**
 * Open a TLS connection, send the request line and collect the response.
 * Capsules typically use self-signed certificates, so the certificate is
 * not verified.
 */
export function sendGeminiRequest(url: URL, timeoutMs: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const port = url.port ? Number(url.port) : GEMINI_DEFAULT_PORT;
    const chunks: Buffer[] = [];

    const socket = tls.connect(
      {
        host: url.hostname,
        port,
        // SNI must not be an IP address
        servername: isIP(url.hostname) ? undefined : url.hostname,
        rejectUnauthorized: false,
      },
      () => {
        socket.write(`${url.href}\r\n`);
      },
    );

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`timed out after ${timeoutMs}ms`));
    });
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("end", () => resolve(Buffer.concat(chunks)));
    socket.on("error", reject);
  });
}

/**
 * Split a raw response into status, meta and body.
 *
 * @param url - Request URL, for error reporting
 * @throws {FetchError} If the header line is missing or malformed
 */
export function parseGeminiResponse(raw: Buffer, url: string): GeminiResponse {
  const headerEnd = raw.indexOf("\r\n");
  if (headerEnd === -1) {
    throw new FetchError(`Malformed Gemini response from ${url}: missing header line`, { url });
  }

  const header = raw.subarray(0, headerEnd).toString("utf-8");
  const match = /^(\d{2})(?:[ \t]+(.*))?$/.exec(header);
  if (!match) {
    throw new FetchError(`Malformed Gemini response header from ${url}: "${header}"`, { url });
  }

  return {
    status: Number(match[1]),
    meta: (match[2] ?? "").trim(),
    body: raw.subarray(headerEnd + 2),
  };
}

/**
 * Fetch a gemini:// URL, following redirects.
 *
 * @param request - Transport to use; defaults to a real TLS connection
 * @throws {FetchError} On connection failure, non-success status, or redirect loop
 */
export async function fetchGemini(
  url: string,
  timeoutMs: number,
  request: GeminiRequest = sendGeminiRequest,
): Promise<FetchedDocument> {
  let current = url;

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    let raw: Buffer;
    try {
      raw = await request(new URL(current), timeoutMs);
    } catch (error) {
      throw new FetchError(`Could not retrieve ${current}: ${errorMessage(error)}`, { url: current, cause: error });
    }

    const { status, meta, body } = parseGeminiResponse(raw, current);

    switch (Math.floor(status / 10)) {
      case 2: {
        const { mimeType, charset } = parseContentType(meta, "text/gemini");
        return { url: current, mimeType, charset, body };
      }
      case 3: {
        const target = resolveUrl(meta, current);
        if (!target) {
          throw new FetchError(`Invalid redirect from ${current} to "${meta}"`, { url: current });
        }
        if (!target.startsWith("gemini:")) {
          throw new FetchError(`Refusing cross-protocol redirect from ${current} to ${target}`, { url: current });
        }
        current = target;
        continue;
      }
      case 1:
        throw new FetchError(`${current} asks for input (${status} ${meta})`, { url: current });
      default:
        throw new FetchError(`Gemini status ${status} for ${current}: ${meta || "no details"}`, { url: current });
    }
  }

  throw new FetchError(`Too many redirects starting at ${url}`, { url });
}
