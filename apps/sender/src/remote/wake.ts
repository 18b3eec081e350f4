import dgram from "node:dgram";

import { ConfigurationError, PLACEHOLDER_MAC_ADDRESS } from "@photorelay/shared";

export const WAKE_PORT = 9;

export type WakeSender = (packet: Buffer, broadcastAddress: string) => Promise<void>;

export function parseMacAddress(raw: string): Buffer {
  const trimmed = raw.trim();
  if (!trimmed || trimmed.toUpperCase() === PLACEHOLDER_MAC_ADDRESS) {
    throw new ConfigurationError("destination.mac_address is not configured");
  }
  const hex = trimmed.replace(/[:-]/g, "");
  if (!/^[0-9a-fA-F]{12}$/.test(hex)) {
    throw new ConfigurationError(`destination.mac_address is not a valid MAC address: ${raw}`);
  }
  return Buffer.from(hex, "hex");
}

/** Six 0xFF bytes followed by the MAC repeated sixteen times. */
export function buildMagicPacket(mac: Buffer): Buffer {
  const packet = Buffer.alloc(6 + 16 * mac.length, 0xff);
  for (let i = 0; i < 16; i += 1) {
    mac.copy(packet, 6 + i * mac.length);
  }
  return packet;
}

export const sendUdpBroadcast: WakeSender = async (packet, broadcastAddress) => {
  const socket = dgram.createSocket("udp4");
  try {
    await new Promise<void>((resolve, reject) => {
      socket.once("error", reject);
      socket.bind(() => {
        socket.setBroadcast(true);
        socket.send(packet, WAKE_PORT, broadcastAddress, (err) => (err ? reject(err) : resolve()));
      });
    });
  } finally {
    socket.close();
  }
};
