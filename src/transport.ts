import { createSocket } from 'node:dgram';
import type { RemoteInfo } from 'node:dgram';
import { connect, isIP, isIPv6 } from 'node:net';
import { DEFAULT_TIMEOUT_MS, FLAG_TC } from './constants.js';
import { splitHostPort } from './domain.js';
import { NetworkError } from './errors.js';
import { ipv6ToBytes } from './ip.js';

const MAX_TCP_MESSAGE = 0xffff;

export type Protocol = 'udp' | 'tcp';

export interface ExchangeOptions {
  /** Interrupts the exchange; the promise rejects with the signal's reason */
  signal?: AbortSignal;
}

/** Sends one encoded message and resolves with the raw reply */
export interface Transport {
  exchange(
    request: Buffer,
    address: string,
    options?: ExchangeOptions
  ): Promise<Buffer>;
}

export interface TransportOptions {
  /** Defaults to `udp`; truncated UDP replies are fetched again over TCP */
  protocol?: Protocol;
  /** Milliseconds to wait for a reply */
  timeout?: number;
}

interface Target {
  address: string;
  host: string;
  port: number;
}

interface Inflight {
  promise: Promise<Buffer>;
  controller: AbortController;
  waiters: number;
}

function parseTarget(address: string): Target {
  const parts = splitHostPort(address);
  if (!parts.ok) {
    throw new NetworkError(address, `invalid nameserver address: ${parts.reason}`);
  }
  const port = Number(parts.port);
  if (!/^\d+$/.test(parts.port) || port > 0xffff) {
    throw new NetworkError(address, `invalid port "${parts.port}"`);
  }
  return { address, host: parts.host, port };
}

/**
 * Settle a socket exchange exactly once, tearing down the timer, abort
 * listener and socket on the way out.
 */
function settler(
  target: Target,
  timeout: number,
  signal: AbortSignal,
  close: () => void,
  resolve: (reply: Buffer) => void,
  reject: (reason: unknown) => void
) {
  let settled = false;

  const timer = setTimeout(() => {
    fail(new NetworkError(target.address, `no reply within ${timeout}ms`));
  }, timeout);
  const onAbort = () => fail(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });

  function finish(): boolean {
    if (settled) return false;
    settled = true;
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
    close();
    return true;
  }

  function fail(reason: unknown): void {
    if (finish()) reject(reason);
  }

  function succeed(reply: Buffer): void {
    if (finish()) resolve(reply);
  }

  return { fail, succeed };
}

/** Whether a datagram came from the nameserver; hostnames only match on port */
function fromTarget(remote: RemoteInfo, target: Target): boolean {
  if (remote.port !== target.port) return false;
  switch (isIP(target.host)) {
    case 4:
      return remote.address === target.host;
    case 6:
      return (
        isIPv6(remote.address) &&
        ipv6ToBytes(remote.address).equals(ipv6ToBytes(target.host))
      );
    default:
      return true;
  }
}

function udpExchange(
  request: Buffer,
  target: Target,
  timeout: number,
  signal: AbortSignal
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const socket = createSocket(isIPv6(target.host) ? 'udp6' : 'udp4');
    const id = request.readUInt16BE(0);
    const { fail, succeed } = settler(
      target,
      timeout,
      signal,
      () => socket.close(),
      resolve,
      reject
    );

    socket.on('error', (err) => {
      fail(new NetworkError(target.address, err.message, { cause: err }));
    });
    socket.on('message', (reply, remote) => {
      // Stray datagrams for other transactions or from other hosts are ignored
      if (!fromTarget(remote, target)) return;
      if (reply.length < 2 || reply.readUInt16BE(0) !== id) return;
      succeed(reply);
    });
    socket.send(request, target.port, target.host, (err) => {
      if (err) fail(new NetworkError(target.address, err.message, { cause: err }));
    });
  });
}

function tcpExchange(
  request: Buffer,
  target: Target,
  timeout: number,
  signal: AbortSignal
): Promise<Buffer> {
  if (request.length > MAX_TCP_MESSAGE) {
    return Promise.reject(
      new NetworkError(
        target.address,
        `message of ${request.length} octets exceeds the 65535-octet TCP limit`
      )
    );
  }

  return new Promise((resolve, reject) => {
    const socket = connect({ host: target.host, port: target.port });
    let received = Buffer.alloc(0);
    const { fail, succeed } = settler(
      target,
      timeout,
      signal,
      () => socket.destroy(),
      resolve,
      reject
    );

    socket.on('connect', () => {
      const length = Buffer.alloc(2);
      length.writeUInt16BE(request.length);
      socket.write(Buffer.concat([length, request]));
    });
    socket.on('data', (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      if (received.length < 2) return;
      const size = received.readUInt16BE(0);
      if (received.length < 2 + size) return;
      succeed(Buffer.from(received.subarray(2, 2 + size)));
    });
    socket.on('error', (err) => {
      fail(new NetworkError(target.address, err.message, { cause: err }));
    });
    socket.on('close', () => {
      fail(new NetworkError(target.address, 'connection closed before a reply'));
    });
  });
}

/** Resolve with `promise` unless `signal` aborts first */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Create a UDP/TCP transport.
 *
 * Identical requests in flight at the same time share one exchange; each
 * caller gets the reply under its own message ID. The shared exchange is
 * torn down once every caller waiting on it has aborted.
 */
export function createTransport(options: TransportOptions = {}): Transport {
  const protocol = options.protocol ?? 'udp';
  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const inflight = new Map<string, Inflight>();

  async function send(
    request: Buffer,
    target: Target,
    signal: AbortSignal
  ): Promise<Buffer> {
    if (protocol === 'tcp') return tcpExchange(request, target, timeout, signal);

    const reply = await udpExchange(request, target, timeout, signal);
    if (reply.length >= 4 && reply.readUInt16BE(2) & FLAG_TC) {
      return tcpExchange(request, target, timeout, signal);
    }
    return reply;
  }

  function join(key: string, request: Buffer, target: Target): Inflight {
    const existing = inflight.get(key);
    if (existing) return existing;

    const controller = new AbortController();
    const run = async (): Promise<Buffer> => {
      try {
        return await send(request, target, controller.signal);
      } finally {
        if (inflight.get(key)?.promise === promise) inflight.delete(key);
      }
    };
    const promise: Promise<Buffer> = run();
    const entry = { promise, controller, waiters: 0 };
    inflight.set(key, entry);
    return entry;
  }

  return {
    async exchange(request, address, { signal } = {}) {
      signal?.throwIfAborted();
      const target = parseTarget(address);

      const key = `${protocol}|${address}|${request.toString('hex', 2)}`;
      const entry = join(key, request, target);

      entry.waiters++;
      try {
        const reply = Buffer.from(await untilAborted(entry.promise, signal));
        reply.writeUInt16BE(request.readUInt16BE(0), 0);
        return reply;
      } finally {
        entry.waiters--;
        if (entry.waiters === 0) {
          if (inflight.get(key) === entry) inflight.delete(key);
          entry.controller.abort();
        }
      }
    },
  };
}
