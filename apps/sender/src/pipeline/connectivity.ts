import { ConnectivityError, type DestinationConfig } from "@photorelay/shared";

import { abortError, type RemoteHost } from "../remote/remoteHost.js";
import { buildMagicPacket, parseMacAddress, type WakeSender } from "../remote/wake.js";
import type { Clock, LoggerLike } from "./types.js";

const WAKE_PACKET_COUNT = 3;
const WAKE_PACKET_GAP_MS = 1_000;
const PROBE_INTERVAL_MS = 5_000;

export interface ReachabilityDeps {
  host: RemoteHost;
  dest: DestinationConfig;
  wake: WakeSender;
  clock: Clock;
  log: LoggerLike;
  signal?: AbortSignal;
  onWake?: () => void;
}

export type ReachabilityResult = { woke: boolean; waited_ms: number };

/**
 * Probes the destination; when it does not answer, sends wake packets, waits
 * `wake_wait_time` and then keeps probing every few seconds until
 * `connection_timeout`.
 */
export async function ensureDestinationReachable(deps: ReachabilityDeps): Promise<ReachabilityResult> {
  const { host, dest, clock, log, signal } = deps;
  const startedAt = clock.now();

  if (await host.testConnection()) return { woke: false, waited_ms: 0 };
  if (host.kind === "local") throw new ConnectivityError();

  const mac = parseMacAddress(dest.mac_address);
  const packet = buildMagicPacket(mac);
  log.info({ event: "destination.wake", mac_address: dest.mac_address, broadcast: dest.broadcast_address });
  deps.onWake?.();
  for (let i = 0; i < WAKE_PACKET_COUNT; i += 1) {
    if (signal?.aborted) throw abortError(signal);
    await deps.wake(packet, dest.broadcast_address);
    if (i < WAKE_PACKET_COUNT - 1) await clock.sleep(WAKE_PACKET_GAP_MS, signal);
  }

  const settleMs = dest.wake_wait_time * 1000;
  const deadlineMs = Math.max(settleMs, dest.connection_timeout * 1000);
  const wakeSentAt = clock.now();
  // The first probe waits for the host to boot; later ones poll.
  let waitMs = settleMs > 0 ? settleMs : PROBE_INTERVAL_MS;

  while (clock.now() - wakeSentAt < deadlineMs) {
    const remaining = deadlineMs - (clock.now() - wakeSentAt);
    await clock.sleep(Math.min(waitMs, remaining), signal);
    waitMs = PROBE_INTERVAL_MS;
    if (signal?.aborted) throw abortError(signal);
    if (await host.testConnection()) {
      return { woke: true, waited_ms: clock.now() - startedAt };
    }
    log.info({ event: "destination.wake.waiting", elapsed_ms: clock.now() - wakeSentAt, timeout_ms: deadlineMs });
  }

  log.warn({ event: "destination.unreachable", waited_ms: clock.now() - startedAt });
  throw new ConnectivityError();
}
