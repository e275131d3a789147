import si, { type Systeminformation } from 'systeminformation';

export interface Listener {
  protocol: string;
  localAddress: string;
  localPort: number;
  pid?: number;
  process?: string;
}

export interface ListenerQuery {
  /** Sockets in LISTEN state on `port` */
  listListeners(port: number): Promise<Listener[]>;
}

type Connection = Pick<
  Systeminformation.NetworkConnectionsData,
  'protocol' | 'localAddress' | 'localPort' | 'state' | 'pid' | 'process'
>;

export function filterListeners(connections: readonly Connection[], port: number): Listener[] {
  return connections
    .filter((c) => c.state === 'LISTEN' && Number(c.localPort) === port)
    .map((c) => {
      const listener: Listener = {
        protocol: c.protocol,
        localAddress: c.localAddress,
        localPort: port,
      };
      if (c.pid > 0) listener.pid = c.pid;
      if (c.process) listener.process = c.process;
      return listener;
    });
}

export function formatListener(listener: Listener): string {
  let text = `${listener.protocol} ${listener.localAddress}:${listener.localPort}`;
  if (listener.pid) {
    text += ` pid=${listener.pid}`;
    if (listener.process) text += ` (${listener.process})`;
  }
  return text;
}

export function createListenerQuery(): ListenerQuery {
  return {
    async listListeners(port) {
      return filterListeners(await si.networkConnections(), port);
    },
  };
}
