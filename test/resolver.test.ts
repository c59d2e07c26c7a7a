import { MxLookup, MxRecord, ResolutionFailedError, createResolver, lookupMX } from "../src/index";

const dnsError = (code: string) => Object.assign(new Error(`queryMx ${code} example.com`), { code });

const fakeLookup = (result: MxRecord[] | Error): MxLookup & { domains: string[] } => {
  const domains: string[] = [];
  return {
    domains,
    resolveMx: async (domain) => {
      domains.push(domain);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  };
};

describe("lookupMX", () => {
  it("orders exchanges by preference", async () => {
    const lookup = fakeLookup([
      { exchange: "mx3.example.com", priority: 30 },
      { exchange: "mx1.example.com", priority: 10 },
      { exchange: "mx2a.example.com", priority: 20 },
      { exchange: "mx2b.example.com.", priority: 20 },
    ]);

    const servers = await lookupMX("example.com", { lookup });

    expect(servers).toEqual([
      "mx1.example.com",
      "mx2a.example.com",
      "mx2b.example.com",
      "mx3.example.com",
    ]);
    expect(lookup.domains).toEqual(["example.com"]);
  });

  it("returns an empty list when the domain has no MX records", async () => {
    await expect(lookupMX("example.com", { lookup: fakeLookup(dnsError("ENODATA")) })).resolves.toEqual([]);
  });

  it("drops a null MX record", async () => {
    const lookup = fakeLookup([{ exchange: "", priority: 0 }]);

    await expect(lookupMX("example.com", { lookup })).resolves.toEqual([]);
  });

  it.each(["ENOTFOUND", "ETIMEOUT", "ECONNREFUSED", "ESERVFAIL"])(
    "wraps %s in a ResolutionFailedError",
    async (code) => {
      const cause = dnsError(code);

      const result = lookupMX("example.com", { lookup: fakeLookup(cause) });

      await expect(result).rejects.toBeInstanceOf(ResolutionFailedError);
      await expect(result).rejects.toMatchObject({
        message: "could not resolve MX for example.com",
        cause,
      });
    }
  );

  it("wraps a name server it cannot use in a ResolutionFailedError", async () => {
    await expect(lookupMX("example.com", { server: "dns.google" })).rejects.toBeInstanceOf(
      ResolutionFailedError
    );
  });

  it("does not query when already aborted", async () => {
    const lookup = fakeLookup([]);
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));

    await expect(lookupMX("example.com", { lookup, signal: controller.signal })).rejects.toThrow(
      "shutting down"
    );
    expect(lookup.domains).toEqual([]);
  });

  it("cancels an in-flight query on abort", async () => {
    const controller = new AbortController();
    const cancel = jest.fn();
    let rejectQuery: (err: Error) => void = () => undefined;
    const lookup: MxLookup = {
      resolveMx: () =>
        new Promise((_, reject) => {
          rejectQuery = reject;
        }),
      cancel: () => {
        cancel();
        rejectQuery(dnsError("ECANCELLED"));
      },
    };

    const result = lookupMX("example.com", { lookup, signal: controller.signal });
    controller.abort(new Error("caller timeout"));

    await expect(result).rejects.toThrow("caller timeout");
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});

describe("createResolver", () => {
  it("targets 1.1.1.1 by default", () => {
    expect(createResolver().getServers()).toEqual(["1.1.1.1"]);
  });

  it("targets the configured server and port", () => {
    expect(createResolver({ server: "9.9.9.9", port: 5353 }).getServers()).toEqual(["9.9.9.9:5353"]);
  });
});
