import debug from "debug";
import SMTP, { IResponse, ISocket } from "./client";
import { Connector, dial, SMTP_PORT } from "./transport";
import { Verdict, interpretReply } from "./verdict";
import {
  HandshakeFailedError,
  NoUsableServerError,
  ProtocolError,
  SenderRejectedError,
  ServerFailure,
  errorMessage,
} from "./errors";

const log = debug("mx-probe:mailbox");
const warn = log.extend("warn");

export type MailboxCheck = {
  // identity announced with EHLO/HELO
  fromDomain: string;
  // envelope sender; "" sends the null reverse-path
  fromEmail: string;
  checkEmail: string;
  servers: readonly string[];
};

export type CheckOptions = {
  port?: number;
  timeout?: number;
  signal?: AbortSignal;
  connect?: Connector;
};

export type MailboxVerdict = Verdict & {
  host: string;
  response: string;
};

type Attempt = { ok: true; client: SMTP } | { ok: false; error: unknown };

/**
 * Probes `checkEmail` on the first of `servers` that accepts a session and
 * returns what that server says about the recipient.
 *
 * Failing to reach a server only moves on to the next one; running out of
 * servers is a NoUsableServerError. Once a session is open, a failure in the
 * handshake or sender step is reported as is and no other server is tried.
 */
export async function checkMailbox(
  check: MailboxCheck,
  options: CheckOptions = {}
): Promise<MailboxVerdict> {
  const client = await openSession(check.servers, options);
  try {
    return await probe(client, check);
  } finally {
    await release(client);
  }
}

async function openSession(
  servers: readonly string[],
  options: CheckOptions
): Promise<SMTP> {
  const failures: ServerFailure[] = [];

  for (const host of servers) {
    options.signal?.throwIfAborted();

    const attempt = await tryServer(host, options);
    if (attempt.ok) {
      return attempt.client;
    }
    failures.push({ host, error: attempt.error });
  }

  // an abort during the last attempt surfaces as itself
  options.signal?.throwIfAborted();
  throw new NoUsableServerError("no working mail servers could be found", failures);
}

async function tryServer(host: string, options: CheckOptions): Promise<Attempt> {
  const { port = SMTP_PORT, timeout, signal, connect = dial } = options;

  let socket: ISocket;
  try {
    socket = await connect(host, { port, timeout, signal });
  } catch (error) {
    log("skipping %s: %s", host, errorMessage(error));
    return { ok: false, error };
  }

  const client = new SMTP(socket, host, { timeout, signal });
  try {
    await client.greeting();
  } catch (error) {
    warn("could not setup smtp client for %s: %s", host, errorMessage(error));
    client.close();
    return { ok: false, error };
  }

  log("using %s", host);
  return { ok: true, client };
}

async function probe(client: SMTP, check: MailboxCheck): Promise<MailboxVerdict> {
  try {
    await client.hello(check.fromDomain);
  } catch (err) {
    throw new HandshakeFailedError(`could not HELO ${client.host}`, { cause: err });
  }
  if (client.hasExt("STARTTLS")) {
    log("%s offers STARTTLS, staying on plain transport", client.host);
  }

  try {
    await client.mail(check.fromEmail);
  } catch (err) {
    throw new SenderRejectedError(`could not MAIL FROM ${client.host}`, {
      cause: err,
    });
  }

  let reply: IResponse;
  try {
    reply = await client.rcpt(check.checkEmail);
  } catch (err) {
    throw new ProtocolError(`could not RCPT TO ${client.host}`, { cause: err });
  }

  const verdict = interpretReply(reply.code);
  if (verdict.status === "indeterminate") {
    warn("unknown code returned by %s: %d %s", client.host, reply.code, reply.message);
  }

  return { ...verdict, host: client.host, response: reply.message };
}

// release ends the session. Errors from QUIT are logged, never raised.
async function release(client: SMTP) {
  try {
    await client.quit();
  } catch (err) {
    log("QUIT to %s failed: %s", client.host, errorMessage(err));
  } finally {
    client.close();
  }
}
