import { Socket, isIP } from 'node:net';
import { connect as tlsConnect, type TLSSocket } from 'node:tls';
import { ConnectionError, TimeoutError } from '../core/errors.js';

export interface SocketTarget {
  host: string;
  port: number;
  /** TLS from the first byte */
  secure?: boolean;
  ca?: Buffer;
  /** Connect (and handshake) limit in ms */
  timeout: number;
}

function toConnectionError(err: Error, target: { host: string; port: number }): ConnectionError {
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  return new ConnectionError(`Failed to connect to ${target.host} port ${target.port}: ${err.message}`, {
    host: target.host,
    port: target.port,
    code,
  });
}

function servernameFor(host: string): string | undefined {
  return isIP(host) === 0 ? host : undefined;
}

/**
 * Open a plain or TLS control connection
 *
 * @throws {TimeoutError} when connect or handshake exceeds `timeout`
 * @throws {ConnectionError} for refused or failed connections
 */
export function openSocket(target: SocketTarget): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket: Socket = target.secure
      ? tlsConnect({ host: target.host, port: target.port, ca: target.ca, servername: servernameFor(target.host) })
      : new Socket();

    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(toConnectionError(err, target));
    };
    const onTimeout = () => {
      cleanup();
      socket.destroy();
      reject(new TimeoutError({ phase: target.secure ? 'secureConnect' : 'connect', timeout: target.timeout }));
    };
    const onReady = () => {
      cleanup();
      socket.setTimeout(0);
      resolve(socket);
    };
    const cleanup = () => {
      socket.removeListener('error', onError);
      socket.removeListener('timeout', onTimeout);
    };

    socket.setTimeout(target.timeout);
    socket.once('error', onError);
    socket.once('timeout', onTimeout);

    if (target.secure) {
      socket.once('secureConnect', onReady);
    } else {
      socket.once('connect', onReady);
      socket.connect(target.port, target.host);
    }
  });
}

/**
 * Negotiate TLS over an already connected socket (AUTH TLS, STARTTLS)
 */
export function upgradeSocket(
  socket: Socket,
  options: { host: string; ca?: Buffer; timeout: number }
): Promise<TLSSocket> {
  return new Promise((resolve, reject) => {
    const secure = tlsConnect({ socket, ca: options.ca, servername: servernameFor(options.host) });

    const timer = setTimeout(() => {
      secure.destroy();
      reject(new TimeoutError({ phase: 'secureConnect', timeout: options.timeout }));
    }, options.timeout);

    const onError = (err: Error) => {
      clearTimeout(timer);
      secure.destroy();
      reject(toConnectionError(err, { host: options.host, port: socket.remotePort ?? 0 }));
    };

    secure.once('error', onError);
    secure.once('secureConnect', () => {
      clearTimeout(timer);
      secure.removeListener('error', onError);
      resolve(secure);
    });
  });
}

/**
 * Write and wait until the data is flushed to the kernel
 */
export function writeAsync(socket: Socket, data: string | Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
