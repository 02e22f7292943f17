/**
 * Error kinds raised while talking to the inverter and converting its
 * registers. Each one aborts the current polling cycle.
 */

/** Malformed or truncated frame header or payload, or an invalid request. */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

/** Socket failure: refused connection, write error or early close. */
export class ConnectionError extends Error {
  public readonly host: string | undefined;
  public readonly port: number | undefined;

  constructor(message: string, host?: string, port?: number) {
    super(message);
    this.name = "ConnectionError";
    this.host = host;
    this.port = port;
  }
}

/** A register value that does not fit its definition's encoding. */
export class DecodeError extends Error {
  public readonly address: number;

  constructor(address: number, message: string) {
    super(`register ${address}: ${message}`);
    this.name = "DecodeError";
    this.address = address;
  }
}
