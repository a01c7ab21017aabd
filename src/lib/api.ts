import { config } from "../config";
import { NetworkError, errorMessage } from "./errors";

export type RemoteFile = {
  url: string;
  contentType: string;
  bytes: Uint8Array;
};

/**
 * GETs a data file. Non-2xx responses, transport failures and timeouts all
 * reject with a NetworkError. The timeout covers reading the body too.
 */
export async function fetchRemoteFile(url: string, timeoutMs = config.fetchTimeoutMs): Promise<RemoteFile> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, { method: "GET", signal: controller.signal });
    if (!res.ok) {
      const detail = (await res.text().catch(() => "")).trim();
      throw new NetworkError(`HTTP ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`, res.status);
    }
    const contentType = res.headers.get("content-type") || "";
    const bytes = new Uint8Array(await res.arrayBuffer());
    return { url, contentType, bytes };
  } catch (err) {
    if (err instanceof NetworkError) throw err;
    if (controller.signal.aborted) {
      throw new NetworkError(`Request timed out after ${timeoutMs} ms`);
    }
    throw new NetworkError(errorMessage(err) || "Request failed");
  } finally {
    clearTimeout(timer);
  }
}
