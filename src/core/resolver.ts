import { Resolver } from "dns/promises";
import debug from "debug";
import { ResolutionFailedError, abortError, errorCode } from "./errors";

const log = debug("mx-probe:resolver");

export const DNS_SERVER = "1.1.1.1";
export const DNS_PORT = 53;
export const DNS_TIMEOUT = 5000;

export type MxRecord = { exchange: string; priority: number };

// The part of dns.promises.Resolver that lookupMX needs.
export interface MxLookup {
  resolveMx(hostname: string): Promise<MxRecord[]>;
  cancel?(): void;
}

export type ResolverOptions = {
  server?: string;
  port?: number;
  timeout?: number;
};

export type LookupOptions = ResolverOptions & {
  signal?: AbortSignal;
  lookup?: MxLookup;
};

/**
 * Builds a resolver pinned to a single name server instead of the system
 * configuration. Queries go out over UDP and are tried once.
 */
export function createResolver({
  server = DNS_SERVER,
  port = DNS_PORT,
  timeout = DNS_TIMEOUT,
}: ResolverOptions = {}): Resolver {
  const resolver = new Resolver({ timeout, tries: 1 });
  const host = server.includes(":") ? `[${server}]` : server;
  resolver.setServers([`${host}:${port}`]);
  return resolver;
}

/**
 * Returns the mail exchangers of `domain`, most preferred first.
 *
 * A domain without MX records resolves to an empty list, which is different
 * from a failed lookup (`ResolutionFailedError`).
 */
export async function lookupMX(
  domain: string,
  options: LookupOptions = {}
): Promise<string[]> {
  const { signal } = options;
  signal?.throwIfAborted();

  let lookup: MxLookup | undefined;
  const onAbort = () => lookup?.cancel?.();
  signal?.addEventListener("abort", onAbort, { once: true });

  let records: MxRecord[];
  try {
    lookup = options.lookup ?? createResolver(options);
    log("resolving MX for %s", domain);
    records = await lookup.resolveMx(domain);
  } catch (err) {
    if (signal?.aborted) {
      throw abortError(signal);
    }
    if (errorCode(err) === "ENODATA") {
      log("no MX records for %s", domain);
      return [];
    }
    throw new ResolutionFailedError(`could not resolve MX for ${domain}`, {
      cause: err,
    });
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  const servers = [...records]
    .sort((a, b) => a.priority - b.priority)
    .map((mx) => mx.exchange.replace(/\.$/, ""))
    // null MX (RFC 7505): the domain accepts no mail
    .filter((host) => host !== "");

  log("MX for %s: %o", domain, servers);
  return servers;
}
