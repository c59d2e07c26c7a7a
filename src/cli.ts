#!/usr/bin/env node
import debug from "debug";
import { loadConfig } from "./config";
import {
  MalformedAddressError,
  ResolutionFailedError,
  VerificationError,
  errorMessage,
} from "./core/errors";
import { VerificationOutcome, verifyAddress } from "./verifier";

const log = debug("mx-probe:cli");

const USAGE = "usage: mx-probe [-v|--verbose] [-h|--help] email ...";

export type Output = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const stdio: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Checks each address in turn and prints one line per address. Returns the
 * exit status: 1 when any address was invalid, blocked or could not be
 * checked, 0 otherwise.
 */
export async function run(
  emails: string[],
  verify: (email: string) => Promise<VerificationOutcome>,
  output: Output = stdio
): Promise<number> {
  let status = 0;

  for (const email of emails) {
    let outcome: VerificationOutcome;
    try {
      outcome = await verify(email);
    } catch (err) {
      if (!(err instanceof VerificationError)) {
        throw err;
      }
      output.err(`${email}: ${describeError(err)}`);
      status = 1;
      continue;
    }

    if (outcome.kind === "no-mail-servers") {
      output.out(`${email}: no mail servers found for ${outcome.domain}`);
      continue;
    }

    const { verdict } = outcome;
    log("%s answered %d for %s", verdict.host, verdict.code, email);
    switch (verdict.status) {
      case "valid":
        output.out(`${email}: seems to be valid`);
        break;
      case "indeterminate":
        output.out(`${email}: could not be determined (${verdict.reason})`);
        break;
      case "invalid":
      case "blocked":
        output.out(`${email}: seems to be invalid (${verdict.reason})`);
        status = 1;
        break;
    }
  }

  return status;
}

function describeError(err: VerificationError): string {
  if (err instanceof MalformedAddressError) {
    return `could not extract domain: ${err.message}`;
  }
  if (err instanceof ResolutionFailedError) {
    return `could not retrieve mail server: ${err.message}`;
  }
  const cause = err.cause === undefined ? "" : ` (${errorMessage(err.cause)})`;
  return `could not verify: ${err.message}${cause}`;
}

export async function main(argv: string[], output: Output = stdio): Promise<number> {
  const emails: string[] = [];
  for (const arg of argv) {
    if (arg === "-h" || arg === "--help") {
      output.out(USAGE);
      return 0;
    } else if (arg === "-v" || arg === "--verbose") {
      debug.enable("mx-probe:*");
    } else {
      emails.push(arg);
    }
  }

  if (emails.length === 0) {
    output.err(USAGE);
    return 1;
  }

  const config = loadConfig();
  return run(emails, (email) => verifyAddress(email, config), output);
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (status) => {
      process.exitCode = status;
    },
    (err) => {
      console.error(errorMessage(err));
      process.exitCode = 1;
    }
  );
}
