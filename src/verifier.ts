import debug from "debug";
import { Config } from "./config";
import { extractDomain } from "./core/address";
import { MxLookup, lookupMX } from "./core/resolver";
import { Connector } from "./core/transport";
import { MailboxVerdict, checkMailbox } from "./core/mailbox";

const log = debug("mx-probe:verifier");

export type VerificationOutcome =
  | {
      kind: "verdict";
      email: string;
      domain: string;
      servers: string[];
      verdict: MailboxVerdict;
    }
  | { kind: "no-mail-servers"; email: string; domain: string };

export type VerifierDeps = {
  lookup?: MxLookup;
  connect?: Connector;
  signal?: AbortSignal;
};

// verifyAddress runs the whole check for one address. Errors are not caught.
export async function verifyAddress(
  email: string,
  config: Config,
  { lookup, connect, signal }: VerifierDeps = {}
): Promise<VerificationOutcome> {
  const domain = extractDomain(email);

  const servers = await lookupMX(domain, {
    server: config.dnsServer,
    port: config.dnsPort,
    timeout: config.timeout,
    signal,
    lookup,
  });
  if (servers.length === 0) {
    log("no mail servers found for %s", email);
    return { kind: "no-mail-servers", email, domain };
  }

  const verdict = await checkMailbox(
    {
      fromDomain: config.fromDomain,
      fromEmail: config.fromEmail,
      checkEmail: email,
      servers,
    },
    { port: config.smtpPort, timeout: config.timeout, signal, connect }
  );

  return { kind: "verdict", email, domain, servers, verdict };
}
