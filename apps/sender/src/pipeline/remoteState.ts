import {
  READY_MARKER_NAME,
  TRANSFER_MANIFEST_NAME,
  completionManifestName,
  deriveRemoteBatchState,
  type BatchId,
  type PipelineConfig,
  type RemoteBatchFacts,
  type RemoteBatchState,
} from "@photorelay/shared";

import { joinRemote, type RemoteHost } from "../remote/remoteHost.js";

export interface RemoteBatchView {
  batch_id: BatchId;
  state: RemoteBatchState;
  facts: RemoteBatchFacts;
}

/** Reads the destination's markers for one batch and names its state. */
export async function inspectRemoteBatch(
  host: RemoteHost,
  cfg: Readonly<PipelineConfig>,
  batchId: BatchId,
): Promise<RemoteBatchView> {
  const incomingDir = joinRemote(cfg.paths.remote_incoming, batchId);
  const [incoming, marker, transferManifest, completion, processed] = await Promise.all([
    host.stat(incomingDir),
    host.stat(joinRemote(incomingDir, READY_MARKER_NAME)),
    host.stat(joinRemote(incomingDir, TRANSFER_MANIFEST_NAME)),
    host.stat(joinRemote(cfg.paths.remote_reports, completionManifestName(batchId))),
    host.stat(joinRemote(cfg.paths.remote_processed, batchId)),
  ]);
  const facts: RemoteBatchFacts = {
    incomingDirExists: incoming?.isDirectory === true,
    readyMarkerExists: marker !== null,
    transferManifestExists: transferManifest !== null,
    completionManifestExists: completion !== null,
    processedDirExists: processed?.isDirectory === true,
  };
  return { batch_id: batchId, state: deriveRemoteBatchState(facts), facts };
}

/** Creates the incoming, processed and reports roots when missing. */
export async function prepareDestination(host: RemoteHost, cfg: Readonly<PipelineConfig>): Promise<string[]> {
  const roots = [cfg.paths.remote_incoming, cfg.paths.remote_processed, cfg.paths.remote_reports];
  const created: string[] = [];
  for (const root of roots) {
    if (await host.stat(root)) continue;
    await host.mkdirp(root);
    created.push(root);
  }
  return created;
}
