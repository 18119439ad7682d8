import { createSocket as createDgramSocket, type SocketType } from "node:dgram";
import { isErrnoException } from "../errors.js";
import { AddressFamily } from "./address.js";

/** The slice of a dgram socket the bind probe needs. */
export interface BindableSocket {
  bind(port: number, address: string, callback: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  close(): unknown;
}

export interface LocalAddressOptions {
  /** Socket factory (test injection) */
  createSocket?: (type: SocketType) => BindableSocket;
}

/**
 * Check whether `address` is assignable on this host by binding a transient
 * socket to it on an ephemeral port.
 *
 * Resolves false only for EADDRNOTAVAIL; any other bind error rejects with
 * the original error. The socket is closed on every path.
 */
export async function isLocalAddress(
  address: string,
  family: AddressFamily,
  opts: LocalAddressOptions = {}
): Promise<boolean> {
  const createSocket: (type: SocketType) => BindableSocket =
    opts.createSocket ?? createDgramSocket;
  const sock = createSocket(family === AddressFamily.IPv6 ? "udp6" : "udp4");
  try {
    await new Promise<void>((resolve, reject) => {
      sock.once("error", reject);
      sock.bind(0, address, resolve);
    });
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "EADDRNOTAVAIL") {
      return false;
    }
    throw err;
  } finally {
    sock.close();
  }
}
