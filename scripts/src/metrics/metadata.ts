import os from "node:os";

import type { MetadataValues } from "lib/metrics/types.js";

/** Standard set of metadata describing the host the metrics were taken on. */
export function systemInfo(): MetadataValues {
  return {
    machine: os.machine(),
    platform: `${os.type()}-${os.release()}-${os.arch()}`,
    system: os.type(),
    release: os.release(),
    num_cores: os.cpus().length,
    hostname: os.hostname()
  };
}
