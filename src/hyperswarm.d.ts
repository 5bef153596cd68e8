declare module 'hyperswarm' {
  import { EventEmitter } from 'events';
  import { Duplex } from 'stream';

  namespace Hyperswarm {
    interface PeerInfo {
      publicKey?: Buffer;
      topics?: Buffer[];
      client?: boolean;
      server?: boolean;
      ban?: (permanent?: boolean) => void;
    }

    interface SwarmOptions {
      seed?: Buffer;
      maxPeers?: number;
      bootstrap?: string[];
      firewall?: (remotePublicKey: Buffer) => boolean;
    }

    interface JoinOptions {
      server?: boolean;
      client?: boolean;
    }
  }

  class Hyperswarm extends EventEmitter {
    constructor(opts?: Hyperswarm.SwarmOptions);

    connections: Set<Duplex>;
    peers: Map<string, Hyperswarm.PeerInfo>;

    join(topic: Buffer, opts?: Hyperswarm.JoinOptions): unknown;
    leave(topic: Buffer): Promise<void>;
    destroy(): Promise<void>;

    on(event: 'connection', listener: (socket: Duplex, peerInfo: Hyperswarm.PeerInfo) => void): this;
    on(event: 'error', listener: (err: Error) => void): this;
    on(event: 'update', listener: () => void): this;
    on(event: 'close', listener: () => void): this;
  }

  export = Hyperswarm;
}
