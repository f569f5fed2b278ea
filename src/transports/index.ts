/**
 * Transport exports
 */

import type { TransportKind } from "../types/config";
import type { Transport } from "./types";
import { GdownTransport } from "./gdown";
import { HttpTransport } from "./http";

export type { Transport, TransportResult } from "./types";
export { TransportTimeoutError, TransportUnavailableError } from "./types";
export { GdownTransport, execFileRunner, driveDownloadUrl } from "./gdown";
export type { ExecRunner, ExecOutcome, GdownTransportOptions } from "./gdown";
export { HttpTransport } from "./http";
export type { HttpTransportOptions, FetchFn } from "./http";

export function createTransport(kind: TransportKind): Transport {
  switch (kind) {
    case "gdown":
      return new GdownTransport();
    case "http":
      return new HttpTransport();
  }
}
