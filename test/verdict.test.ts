import { ProtocolError, SMTPDisconnectedError, interpretReply } from "../src/index";

describe("interpretReply", () => {
  it("maps the known codes", () => {
    expect(interpretReply(250).status).toBe("valid");
    expect(interpretReply(550).status).toBe("invalid");
    expect(interpretReply(554).status).toBe("blocked");
  });

  it("explains a blocked sender", () => {
    expect(interpretReply(554)).toEqual({
      status: "blocked",
      code: 554,
      reason: "appears our IP is blacklisted",
    });
  });

  it.each([200, 251, 252, 421, 450, 451, 452, 500, 551, 552, 553, 999])(
    "treats %d as indeterminate",
    (code) => {
      expect(interpretReply(code)).toEqual({
        status: "indeterminate",
        code,
        reason: `unknown code returned: ${code}`,
      });
    }
  );

  it("is total over three-digit codes", () => {
    const seen = new Set<string>();
    for (let code = 100; code <= 999; code++) {
      seen.add(interpretReply(code).status);
    }
    expect([...seen].sort()).toEqual(["blocked", "indeterminate", "invalid", "valid"]);
  });

  it("turns a read error into a ProtocolError", () => {
    const cause = new SMTPDisconnectedError("gone");

    let thrown: unknown;
    try {
      interpretReply(250, cause);
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(ProtocolError);
    expect(thrown instanceof Error && thrown.cause).toBe(cause);
  });
});
