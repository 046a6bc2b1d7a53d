import type { Transport } from "../ports/transport.js";
import {
  assertOk,
  basicAuthorization,
  defaultFetch,
  toTransferError,
  writeBody,
  type FetchLike,
} from "../http.js";

/**
 * RDA transport: a single authenticated GET, body streamed to the destination.
 */
export function createDirectHttpTransport(fetchImpl: FetchLike = defaultFetch): Transport {
  return {
    async retrieve({ target, credentials, outputPath, timeoutMs }): Promise<void> {
      if (target.kind !== "direct") {
        throw new TypeError(`Direct HTTP transport cannot retrieve ${target.kind} targets`);
      }

      try {
        const response = await fetchImpl(target.url, {
          method: "GET",
          headers: {
            Authorization: basicAuthorization(credentials.identity, credentials.secret),
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
        await assertOk(response);
        await writeBody(response, outputPath);
      } catch (error) {
        throw toTransferError(error, timeoutMs);
      }
    },
  };
}
