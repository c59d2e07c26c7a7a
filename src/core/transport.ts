import net from "net";
import debug from "debug";
import { SMTPTimeoutError, abortError } from "./errors";

const log = debug("mx-probe:transport");

export const SMTP_PORT = 25;
export const CONNECT_TIMEOUT = 5000;

export type DialOptions = {
  port?: number;
  timeout?: number;
  signal?: AbortSignal;
};

export type Connector = (host: string, options: DialOptions) => Promise<net.Socket>;

// dial opens a plain (unencrypted) TCP connection to host.
export const dial: Connector = (
  host,
  { port = SMTP_PORT, timeout = CONNECT_TIMEOUT, signal } = {}
) => {
  if (signal?.aborted) {
    return Promise.reject(abortError(signal));
  }

  return new Promise((resolve, reject) => {
    log("connecting to %s:%d", host, port);
    const socket = net.connect({ host, port, timeout });

    const cleanup = () => {
      socket.removeListener("connect", onConnect);
      socket.removeListener("timeout", onTimeout);
      socket.removeListener("error", onError);
      signal?.removeEventListener("abort", onAbort);
    };
    const fail = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(err);
    };

    const onConnect = () => {
      cleanup();
      log("connected to %s:%d", host, port);
      resolve(socket);
    };
    const onTimeout = () =>
      fail(new SMTPTimeoutError(`connection to ${host}:${port} timed out`));
    const onError = (err: Error) => fail(err);
    const onAbort = () => fail(signal ? abortError(signal) : new Error("aborted"));

    socket.once("connect", onConnect);
    socket.once("timeout", onTimeout);
    socket.once("error", onError);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};
