import * as net from 'net';
import type { ConnectResult, Url } from './types.js';

/**
 * Opens a single TCP connection to `url.host:url.port`.
 *
 * The returned promise never rejects: it resolves with the connected socket,
 * now owned by the caller, or with a `ConnectionError` wrapping the failure
 * reported by the OS (DNS lookup, refusal, unreachable network). There is no
 * retry and no timeout beyond the OS connect behaviour.
 * @param url The target; only `host` and `port` are used.
 * @returns The open socket or the wrapped transport failure.
 */
export function connect(url: Url): Promise<ConnectResult> {
  const { host, port } = url;

  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });

    const onConnect = () => {
      socket.off('error', onError);
      resolve({ ok: true, value: socket });
    };

    const onError = (cause: Error) => {
      socket.off('connect', onConnect);
      socket.destroy();
      resolve({
        ok: false,
        error: { kind: 'ConnectionError', host, port, cause },
      });
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}
