import type { PipelineConfig } from "@photorelay/shared";

import type { LoggerLike } from "../pipeline/types.js";
import { LocalRemoteHost } from "./localRemoteHost.js";
import type { RemoteHost } from "./remoteHost.js";
import { SshRemoteHost } from "./sshRemoteHost.js";

export function createRemoteHost(cfg: Readonly<PipelineConfig>, homeDir: string, log: LoggerLike): RemoteHost {
  if (cfg.destination.transport === "local") return new LocalRemoteHost(homeDir);
  return new SshRemoteHost(cfg.destination, homeDir, log);
}
