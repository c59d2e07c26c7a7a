export { default as Client } from "./core/client";
export type { ClientOptions, IExtension, IResponse, ISocket } from "./core/client";
export * from "./core/errors";
export { parseAddress, extractDomain } from "./core/address";
export type { Address } from "./core/address";
export { createResolver, lookupMX } from "./core/resolver";
export type { LookupOptions, MxLookup, MxRecord, ResolverOptions } from "./core/resolver";
export { dial } from "./core/transport";
export type { Connector, DialOptions } from "./core/transport";
export { interpretReply } from "./core/verdict";
export type { Verdict, VerdictStatus } from "./core/verdict";
export { checkMailbox } from "./core/mailbox";
export type { CheckOptions, MailboxCheck, MailboxVerdict } from "./core/mailbox";
export { defaults, loadConfig } from "./config";
export type { Config } from "./config";
export { verifyAddress } from "./verifier";
export type { VerificationOutcome, VerifierDeps } from "./verifier";
