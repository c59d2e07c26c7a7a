import net from "net";
import { ConfigError } from "./core/errors";
import { DNS_PORT, DNS_SERVER, DNS_TIMEOUT } from "./core/resolver";
import { SMTP_PORT } from "./core/transport";

export type Config = {
  fromDomain: string;
  fromEmail: string;
  dnsServer: string;
  dnsPort: number;
  smtpPort: number;
  // applies to the DNS query, the connect and every SMTP round-trip
  timeout: number;
};

export const defaults: Config = {
  fromDomain: "localhost",
  fromEmail: "",
  dnsServer: DNS_SERVER,
  dnsPort: DNS_PORT,
  smtpPort: SMTP_PORT,
  timeout: DNS_TIMEOUT,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    fromDomain: env.MXPROBE_FROM_DOMAIN || defaults.fromDomain,
    fromEmail: env.MXPROBE_FROM_EMAIL ?? defaults.fromEmail,
    dnsServer: readIP(env, "MXPROBE_DNS_SERVER", defaults.dnsServer),
    dnsPort: readInt(env, "MXPROBE_DNS_PORT", defaults.dnsPort),
    smtpPort: readInt(env, "MXPROBE_SMTP_PORT", defaults.smtpPort),
    timeout: readInt(env, "MXPROBE_TIMEOUT", defaults.timeout),
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${JSON.stringify(raw)}`);
  }
  return Number(raw);
}

// The resolver takes addresses only, it cannot look up the name server itself.
function readIP(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (net.isIP(raw) === 0) {
    throw new ConfigError(`${name} must be an IPv4 or IPv6 address, got ${JSON.stringify(raw)}`);
  }
  return raw;
}
