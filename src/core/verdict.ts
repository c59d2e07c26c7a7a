import { ProtocolError } from "./errors";

export type VerdictStatus = "valid" | "invalid" | "blocked" | "indeterminate";

export type Verdict = {
  status: VerdictStatus;
  code: number;
  reason: string;
};

/**
 * Maps the reply to RCPT TO onto a verdict. Every code has one; codes the
 * table below does not know are indeterminate.
 *
 * Passing the error a read failed with turns the call into a ProtocolError:
 * a dropped connection is not a reply.
 */
export function interpretReply(code: number, error?: unknown): Verdict {
  if (error !== undefined) {
    throw new ProtocolError("smtp response error", { cause: error });
  }

  switch (code) {
    case 250:
      return { status: "valid", code, reason: "recipient accepted" };
    case 550:
      return {
        status: "invalid",
        code,
        reason: "email does not seem to exist (or server blocks detection)",
      };
    case 554:
      return { status: "blocked", code, reason: "appears our IP is blacklisted" };
    default:
      return { status: "indeterminate", code, reason: `unknown code returned: ${code}` };
  }
}
