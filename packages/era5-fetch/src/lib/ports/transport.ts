import type { RemoteTarget } from "../archive/types.js";
import type { Credentials } from "../credentials.js";

export interface TransferRequest {
  target: RemoteTarget;
  credentials: Credentials;
  /** Destination file; the transport writes the response body here */
  outputPath: string;
  /** Upper bound for one network exchange, in milliseconds */
  timeoutMs: number;
}

/**
 * One archive's way of moving a file to disk.
 * Allows testing the executor without network requests.
 * Failures are thrown as CLIErrors with a TRANSFER_* code.
 */
export interface Transport {
  retrieve(request: TransferRequest): Promise<void>;
}
