import util from "util";
import net from "net";
import debug from "debug";
import {
  SMTPError,
  SMTPDisconnectedError,
  SMTPProtocolError,
  SMTPResponseError,
  SMTPTimeoutError,
  abortError,
} from "./errors";

const log = debug("mx-probe:smtp");

export type ISocket = net.Socket;
export type IExtension = { [key: string]: string };

export type IResponse = { code: number; message: string };

export type ClientOptions = {
  // bound on every reply (and on socket idleness), in milliseconds
  timeout?: number;
  signal?: AbortSignal;
};

type Waiter = {
  resolve: (resp: IResponse) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export const REPLY_TIMEOUT = 5000;
// RFC 5321 allows 512 octets per reply line
export const MAX_LINE_LENGTH = 2048;
export const MAX_REPLY_LINES = 100;

export default class SMTP {
  /**
   * A Client represents a session with an SMTP server over a socket that is
   * already connected. The client owns the socket from then on: close()
   * releases it.
   */

  private ext: IExtension = {};
  private didHello: boolean = false;
  private closed: boolean = false;

  private buffer: string = "";
  private lines: string[] = [];
  private replies: IResponse[] = [];
  private waiter: Waiter | undefined;
  private failure: Error | undefined;

  private readonly timeout: number;
  private readonly signal: AbortSignal | undefined;
  private readonly onAbort = () => {
    if (this.signal) {
      this.socket.destroy(abortError(this.signal));
    }
  };

  constructor(
    private readonly socket: ISocket,
    public readonly host: string,
    { timeout = REPLY_TIMEOUT, signal }: ClientOptions = {},
    private readonly localName = "localhost"
  ) {
    this.timeout = timeout;
    this.signal = signal;

    socket.setEncoding("utf-8");
    socket.setTimeout(timeout);

    socket.on("data", (data: string | Buffer) => this.receive(data.toString()));
    socket.on("timeout", () => {
      log("timeout error");
      socket.destroy(new SMTPTimeoutError(`${host}: no reply within ${timeout}ms`));
    });
    socket.on("error", (err) => this.fail(err));
    socket.on("end", () =>
      this.fail(new SMTPDisconnectedError(`${host} closed the connection`))
    );
    socket.on("close", () =>
      this.fail(new SMTPDisconnectedError(`connection to ${host} closed`))
    );

    if (signal?.aborted) {
      this.onAbort();
    } else {
      signal?.addEventListener("abort", this.onAbort, { once: true });
    }
  }

  // greeting reads the banner the server sends right after connecting.
  public async greeting(): Promise<IResponse> {
    const resp = await this.read();
    log("connect: %d %s", resp.code, resp.message);
    return this.expect(resp, 220);
  }

  // Close closes the connection. Calling it again is a no-op.
  public close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.signal?.removeEventListener("abort", this.onAbort);
    this.socket.destroy();
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public async cmd(
    expectCode: number | undefined,
    format: string,
    ...args: unknown[]
  ): Promise<IResponse> {
    const line = util.format(format, ...args);
    if (/[\r\n]/.test(line)) {
      throw new SMTPError("command contains a line break: " + JSON.stringify(line));
    }

    log(">> " + line);
    await this.write(`${line}\r\n`);
    const resp = await this.read();
    log("<< %d %s", resp.code, resp.message);

    return this.expect(resp, expectCode);
  }

  // hello runs a hello exchange if needed.
  public async hello(name: string = this.localName) {
    if (this.didHello) {
      return;
    }
    this.didHello = true;

    let resp = await this.ehlo(name);
    if (!isPositive(resp.code)) {
      resp = await this.helo(name);
      if (!isPositive(resp.code)) {
        throw new SMTPResponseError(resp.code, resp.message);
      }
    }
  }

  // helo sends the HELO greeting to the server. It should be used only when the
  // server does not support ehlo.
  public async helo(name: string = this.localName): Promise<IResponse> {
    this.ext = {};
    return this.cmd(undefined, "HELO %s", name);
  }

  // ehlo sends the EHLO (extended hello) greeting to the server. It
  // should be the preferred greeting for servers that support it.
  public async ehlo(name: string = this.localName): Promise<IResponse> {
    const { code, message } = await this.cmd(undefined, "EHLO %s", name);
    if (!isPositive(code)) {
      return { code, message };
    }

    const ext: IExtension = {};
    const extList = message.split("\n");
    extList.shift(); // the first line is the server's own greeting
    for (const line of extList) {
      const [k, ...v] = line.split(" ");
      if (k) {
        ext[k.toUpperCase()] = v.join(" ");
      }
    }
    this.ext = ext;

    return { code, message };
  }

  public async mail(from: string): Promise<IResponse> {
    // ehlo or helo first
    await this.hello();

    return this.cmd(250, "MAIL FROM:<%s>", from);
  }

  // rcpt declares a recipient. The reply is returned whatever its code, it is
  // up to the caller to judge it.
  public async rcpt(to: string): Promise<IResponse> {
    return this.cmd(undefined, "RCPT TO:<%s>", to);
  }

  // Quit sends QUIT command. The connection still has to be closed.
  public async quit(): Promise<IResponse> {
    return this.cmd(221, "QUIT");
  }

  public hasExt(opt: string): boolean {
    return opt.toUpperCase() in this.ext;
  }

  private write(data: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new SMTPDisconnectedError("connection already closed"));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(data, "utf-8", (err) => (err ? reject(err) : resolve()));
    });
  }

  private read(): Promise<IResponse> {
    const resp = this.replies.shift();
    if (resp) {
      return Promise.resolve(resp);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new SMTPError("a reply is already being awaited"));
    }

    // deadline for the whole reply, however slowly its bytes arrive
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        log("reply deadline passed");
        this.socket.destroy(
          new SMTPTimeoutError(`${this.host}: no complete reply within ${this.timeout}ms`)
        );
      }, this.timeout);
      this.waiter = { resolve, reject, timer };
    });
  }

  private receive(data: string) {
    this.buffer += data;
    const parts = this.buffer.split("\n");
    this.buffer = parts.pop() ?? "";
    if (this.buffer.length > MAX_LINE_LENGTH) {
      this.socket.destroy(new SMTPProtocolError(`reply line longer than ${MAX_LINE_LENGTH}`));
      return;
    }

    for (const part of parts) {
      const line = part.replace(/\r$/, "");
      if (!/^\d{3}([ -]|$)/.test(line) || line.length > MAX_LINE_LENGTH) {
        this.socket.destroy(
          new SMTPProtocolError("malformed reply line: " + JSON.stringify(line.substring(0, 80)))
        );
        return;
      }

      this.lines.push(line);
      if (this.lines.length > MAX_REPLY_LINES) {
        this.socket.destroy(new SMTPProtocolError(`reply longer than ${MAX_REPLY_LINES} lines`));
        return;
      }
      if (line.charAt(3) !== "-") {
        this.deliver(parseReply(this.lines));
        this.lines = [];
      }
    }
  }

  private deliver(resp: IResponse) {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.resolve(resp);
    } else {
      this.replies.push(resp);
    }
  }

  private fail(err: Error) {
    if (!this.failure) {
      this.failure = err;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.reject(this.failure);
    }
  }

  private expect(resp: IResponse, expectCode: number | undefined): IResponse {
    if (expectCode !== undefined && resp.code !== expectCode) {
      throw new SMTPResponseError(resp.code, resp.message);
    }
    return resp;
  }
}

function isPositive(code: number): boolean {
  return 200 <= code && code < 300;
}

// parseReply joins the lines of one (possibly multi-line) reply.
export function parseReply(lines: string[]): IResponse {
  const code = parseInt(lines[lines.length - 1].substring(0, 3), 10);
  const message = lines.map((line) => line.substring(4).trim()).join("\n");
  return { code, message };
}
