// Server endpoint.

/** Host and port of an RPC server. */
export class Address {
  constructor(
    readonly host: string,
    readonly port: number,
  ) {
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new RangeError(`invalid port: ${port}`);
    }
  }

  /**
   * Parse `"host:port"`. IPv6 hosts may be bracketed (`"[::1]:18800"`).
   */
  static parse(addr: string): Address {
    const lastColon = addr.lastIndexOf(":");
    if (lastColon < 0) {
      throw new TypeError(`Invalid address: ${addr}`);
    }
    let host = addr.slice(0, lastColon);
    const portStr = addr.slice(lastColon + 1);
    if (host.startsWith("[") && host.endsWith("]")) {
      host = host.slice(1, -1);
    }
    if (host.length === 0 || !/^\d+$/.test(portStr)) {
      throw new TypeError(`Invalid address: ${addr}`);
    }
    return new Address(host, Number(portStr));
  }

  static from(addr: Address | string): Address {
    return typeof addr === "string" ? Address.parse(addr) : addr;
  }

  toString(): string {
    return this.host.includes(":") ? `[${this.host}]:${this.port}` : `${this.host}:${this.port}`;
  }
}
