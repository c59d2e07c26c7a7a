import { MalformedAddressError } from "./errors";

export type Address = { localPart: string; domain: string };

export function parseAddress(email: string): Address {
  const parts = email.split("@");
  if (parts.length !== 2) {
    throw new MalformedAddressError(`invalid email address: ${email}`);
  }

  const [localPart, domain] = parts;
  if (!localPart || !domain) {
    throw new MalformedAddressError(`invalid email address: ${email}`);
  }

  return { localPart, domain };
}

export function extractDomain(email: string): string {
  return parseAddress(email).domain;
}
